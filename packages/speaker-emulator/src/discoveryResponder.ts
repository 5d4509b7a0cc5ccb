import { EventEmitter } from 'events';
import type { RemoteInfo } from 'node:dgram';

import {
  createModuleLogger,
  findHeaderInRawMessage,
  parseHttpPacket,
  udpSsdpTransportFactory,
  HTTP_REQUEST_TYPE,
  ZONE_PLAYER_SEARCH_TARGET,
  type SsdpTransport,
  type SsdpTransportFactory,
} from '@lan-announcer/core';
import type { EmulatedSpeaker } from './emulatedSpeaker';

const logger = createModuleLogger('DiscoveryResponder');

export const DEVICE_DESCRIPTION_PATH = '/xml/device_description.xml';

const ADVERTISEMENT_MAX_AGE_SECONDS = 1800;

/** שגיאות סוקט שאין מהן חזרה; התהליך צריך לצאת */
const FATAL_SOCKET_ERROR_CODES: ReadonlySet<string> = new Set([
  'EADDRINUSE',
  'EACCES',
  'EADDRNOTAVAIL',
  'ERR_SOCKET_DGRAM_NOT_RUNNING',
]);

export function isFatalSocketError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  const code: unknown = Reflect.get(err, 'code');
  return typeof code === 'string' && FATAL_SOCKET_ERROR_CODES.has(code);
}

export interface DiscoveryResponderOptions {
  /** הכתובת שמופיעה ב-LOCATION */
  advertiseHost: string;
  transportFactory?: SsdpTransportFactory;
}

/**
 * @hebrew בודק אם דאטגרמה היא M-SEARCH עבור ZonePlayer.
 */
export function isZonePlayerSearch(msg: Buffer): boolean {
  const text = msg.toString('utf-8');
  // NOTIFY ותגובות של התקנים אחרים נזרקים בלי לפרסר
  if (!text.startsWith('M-SEARCH ')) {
    return false;
  }
  const packet = parseHttpPacket(msg, HTTP_REQUEST_TYPE);
  const searchTarget = packet?.headers['st'] ?? findHeaderInRawMessage(text, 'ST');
  return searchTarget?.trim() === ZONE_PLAYER_SEARCH_TARGET;
}

/**
 * @hebrew עונה ל-M-SEARCH עם תגובת unicast אחת לכל רמקול מדומה.
 *
 * אירועים:
 * - `search` (rinfo: RemoteInfo) לכל M-SEARCH תואם.
 * - `fatal` (err: Error) כשהסוקט נכשל באופן שאין ממנו חזרה.
 */
export class DiscoveryResponder extends EventEmitter {
  private transport: SsdpTransport | null = null;
  private readonly transportFactory: SsdpTransportFactory;

  constructor(
    private readonly speakers: readonly EmulatedSpeaker[],
    private readonly options: DiscoveryResponderOptions,
  ) {
    super();
    this.transportFactory = options.transportFactory ?? udpSsdpTransportFactory;
  }

  public buildAdvertisement(speaker: EmulatedSpeaker): string {
    return [
      'HTTP/1.1 200 OK',
      `CACHE-CONTROL: max-age=${ADVERTISEMENT_MAX_AGE_SECONDS}`,
      `LOCATION: http://${this.options.advertiseHost}:${speaker.port}${DEVICE_DESCRIPTION_PATH}`,
      `ST: ${ZONE_PLAYER_SEARCH_TARGET}`,
      `USN: uuid:RINCON_EMULATED_${speaker.compactName}`,
      '',
      '',
    ].join('\r\n');
  }

  /**
   * @hebrew מצטרף לקבוצת ה-multicast. כשל בקשירה נזרק.
   */
  public async start(): Promise<void> {
    if (this.transport) return;
    this.transport = await this.transportFactory('listen', this.onMessage, this.onError);
    logger.info(`Answering ZonePlayer searches for ${this.speakers.length} speaker(s)`);
  }

  public async stop(): Promise<void> {
    const transport = this.transport;
    this.transport = null;
    if (transport) {
      await transport.close();
    }
  }

  private readonly onMessage = (msg: Buffer, rinfo: RemoteInfo): void => {
    if (!isZonePlayerSearch(msg)) {
      return;
    }
    logger.info(`M-SEARCH received from ${rinfo.address}:${rinfo.port}`);
    this.emit('search', rinfo);
    this.respond(rinfo).catch((err: unknown) => {
      logger.error(`Failed to answer M-SEARCH from ${rinfo.address}:${rinfo.port}`, err);
    });
  };

  private readonly onError = (err: Error): void => {
    if (isFatalSocketError(err)) {
      logger.error('Unrecoverable SSDP socket error', err);
      this.emit('fatal', err);
      return;
    }
    logger.warn('SSDP socket error, continuing', err);
  };

  private async respond(rinfo: RemoteInfo): Promise<void> {
    const transport = this.transport;
    if (!transport) return;
    for (const speaker of this.speakers) {
      await transport.send(Buffer.from(this.buildAdvertisement(speaker)), rinfo.port, rinfo.address);
      logger.debug(`Advertised ${speaker.name} to ${rinfo.address}:${rinfo.port}`);
    }
  }
}
