// ניהול סוקטי SSDP (UDP): סוקט חיפוש לצד הלקוח וסוקט האזנה ל-multicast לצד האמולטור.

import * as dgram from 'node:dgram';
import * as os from 'node:os';

import type {
  SsdpErrorHandler,
  SsdpMessageHandler,
  SsdpSocketRole,
  SsdpTransport,
  SsdpTransportFactory,
} from './types';
import { createModuleLogger } from './logger';

const logger = createModuleLogger('ssdpSocketManager');

export const SSDP_PORT = 1900;
export const SSDP_MULTICAST_ADDRESS = '239.255.255.250';
export const ZONE_PLAYER_SEARCH_TARGET = 'urn:schemas-upnp-org:device:ZonePlayer:1';
export const DEFAULT_MX_SECONDS = 3;

const M_SEARCH_REQUEST_START_LINE = 'M-SEARCH * HTTP/1.1';
const APIPA_ADDRESS_V4 = '169.254.';
const DEFAULT_MULTICAST_TTL = 4;

/**
 * @hebrew בונה בקשת M-SEARCH בדיוק בפורמט שהתקני ZonePlayer מצפים לו.
 */
export function buildMSearchMessage(searchTarget: string = ZONE_PLAYER_SEARCH_TARGET, mx: number = DEFAULT_MX_SECONDS): string {
  return [
    M_SEARCH_REQUEST_START_LINE,
    `HOST: ${SSDP_MULTICAST_ADDRESS}:${SSDP_PORT}`,
    'MAN: "ssdp:discover"',
    `MX: ${mx}`,
    `ST: ${searchTarget}`,
    '',
    '',
  ].join('\r\n');
}

interface Ipv4Interface {
  name: string;
  address: string;
}

/**
 * @hebrew מאתר ממשקי IPv4 חיצוניים שאינם APIPA.
 * @param allNetworkInterfaces - במבנה של os.networkInterfaces().
 */
export function findRelevantNetworkInterfaces(
  allNetworkInterfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]> = os.networkInterfaces()
): Ipv4Interface[] {
  const relevant: Ipv4Interface[] = [];

  for (const [name, details] of Object.entries(allNetworkInterfaces)) {
    if (!details) continue;
    for (const iface of details) {
      if (iface.family !== 'IPv4') continue;
      if (iface.internal || iface.address.startsWith(APIPA_ADDRESS_V4)) continue;
      relevant.push({ name, address: iface.address });
      logger.trace(`Found relevant IPv4 interface: ${name} - ${iface.address}`);
    }
  }

  return relevant;
}

/**
 * @hebrew כתובת ה-IPv4 המקומית שתפורסם להתקנים (לשרת המדיה או לאמולטור).
 * @returns הכתובת הראשונה שנמצאה, או 127.0.0.1 כשאין ממשק חיצוני.
 */
export function findLocalIPv4Address(
  allNetworkInterfaces?: NodeJS.Dict<os.NetworkInterfaceInfo[]>
): string {
  const [first] = findRelevantNetworkInterfaces(allNetworkInterfaces);
  if (!first) {
    logger.warn('No external IPv4 interface found, falling back to 127.0.0.1');
    return '127.0.0.1';
  }
  return first.address;
}

function closeSocket(socket: dgram.Socket, label: string): Promise<void> {
  return new Promise<void>((resolve) => {
    try {
      socket.close(() => {
        logger.debug(`Socket ${label} closed.`);
        resolve();
      });
    } catch (err) {
      // כבר סגור
      logger.debug(`Socket ${label} was already closed.`, { error: err });
      resolve();
    }
  });
}

/**
 * @hebrew יוצר סוקט UDP אמיתי לפי התפקיד.
 * 'search' נקשר לפורט אקראי; 'listen' נקשר ל-1900 ומצטרף לקבוצת ה-multicast בכל ממשק רלוונטי.
 * כישלון בקשירה דוחה את ה-Promise: זו שגיאת תצורה, לא שגיאה לבקשה.
 */
export function createUdpSsdpTransport(
  role: SsdpSocketRole,
  onMessage: SsdpMessageHandler,
  onError: SsdpErrorHandler,
  networkInterfaces?: NodeJS.Dict<os.NetworkInterfaceInfo[]>
): Promise<SsdpTransport> {
  return new Promise<SsdpTransport>((resolve, reject) => {
    const socket = dgram.createSocket({ type: 'udp4', reuseAddr: true });
    const label = `${role}IPv4`;
    let bound = false;

    socket.on('error', (err) => {
      logger.error(`Socket error for ${label}:`, err);
      if (!bound) {
        void closeSocket(socket, label);
        reject(err);
        return;
      }
      onError(err);
    });

    socket.on('message', (msg, rinfo) => {
      onMessage(msg, rinfo);
    });

    const portToBind = role === 'listen' ? SSDP_PORT : 0;

    socket.bind(portToBind, '0.0.0.0', () => {
      try {
        socket.setMulticastTTL(DEFAULT_MULTICAST_TTL);

        if (role === 'listen') {
          const interfaces = findRelevantNetworkInterfaces(networkInterfaces);
          if (interfaces.length === 0) {
            socket.addMembership(SSDP_MULTICAST_ADDRESS);
          }
          for (const iface of interfaces) {
            socket.addMembership(SSDP_MULTICAST_ADDRESS, iface.address);
          }
        }
      } catch (setupError) {
        logger.error(`Error during socket setup (post-bind) for ${label}:`, setupError);
        void closeSocket(socket, label);
        reject(setupError);
        return;
      }

      bound = true;
      const { address, port } = socket.address();
      logger.info(`Socket ${label} listening on ${address}:${port}${role === 'listen' ? ` and joined multicast group ${SSDP_MULTICAST_ADDRESS}` : ''}`);

      resolve({
        send: (message, port, address) => new Promise<void>((resolveSend, rejectSend) => {
          socket.send(message, 0, message.length, port, address, (err) => {
            if (err) {
              logger.error(`Error sending datagram from ${label} to ${address}:${port}`, err);
              rejectSend(err);
            } else {
              logger.trace(`Datagram sent from ${label} to ${address}:${port}`);
              resolveSend();
            }
          });
        }),
        close: () => closeSocket(socket, label),
        address: () => socket.address(),
      });
    });
  });
}

/**
 * @hebrew ה-factory של ברירת המחדל: סוקטי UDP אמיתיים.
 */
export const udpSsdpTransportFactory: SsdpTransportFactory = (role, onMessage, onError) =>
  createUdpSsdpTransport(role, onMessage, onError);

interface InMemoryEndpoint {
  role: SsdpSocketRole;
  port: number;
  onMessage: SsdpMessageHandler;
  closed: boolean;
}

export interface InMemorySsdpNetwork {
  factory: SsdpTransportFactory;
  /** מספר הדאטגרמות שנשלחו לקבוצת ה-multicast */
  readonly multicastCount: number;
}

/**
 * @hebrew רשת SSDP בתוך התהליך, לבדיקות ולהרצה ללא multicast.
 * דאטגרמה לכתובת הקבוצה ולפורט 1900 מגיעה לכל סוקט 'listen';
 * דאטגרמה לפורט אחר מגיעה לסוקט שקשור אליו. המסירה אסינכרונית.
 */
export function createInMemorySsdpNetwork(hostAddress = '127.0.0.1'): InMemorySsdpNetwork {
  const endpoints: InMemoryEndpoint[] = [];
  let nextPort = 50000;
  let multicastCount = 0;

  const deliver = (target: InMemoryEndpoint, message: Buffer, from: InMemoryEndpoint) => {
    setImmediate(() => {
      if (target.closed) return;
      target.onMessage(Buffer.from(message), {
        address: hostAddress,
        family: 'IPv4',
        port: from.port,
        size: message.length,
      });
    });
  };

  const factory: SsdpTransportFactory = async (role, onMessage) => {
    const endpoint: InMemoryEndpoint = {
      role,
      port: role === 'listen' ? SSDP_PORT : nextPort++,
      onMessage,
      closed: false,
    };
    endpoints.push(endpoint);

    return {
      send: async (message, port, address) => {
        if (endpoint.closed) {
          throw new Error('Not running');
        }
        if (address === SSDP_MULTICAST_ADDRESS && port === SSDP_PORT) {
          multicastCount++;
          for (const target of endpoints) {
            if (target.role === 'listen' && !target.closed) deliver(target, message, endpoint);
          }
          return;
        }
        for (const target of endpoints) {
          if (target.role === 'search' && target.port === port && !target.closed) deliver(target, message, endpoint);
        }
      },
      close: async () => {
        endpoint.closed = true;
      },
      address: () => ({ address: hostAddress, port: endpoint.port }),
    };
  };

  return {
    factory,
    get multicastCount() {
      return multicastCount;
    },
  };
}
