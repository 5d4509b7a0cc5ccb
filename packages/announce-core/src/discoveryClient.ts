import { EventEmitter } from 'events';
import type { RemoteInfo } from 'node:dgram';
import axios from 'axios';

import type {
  DeviceRecord,
  DiscoveryAdvertisement,
  DiscoveryClientOptions,
  SsdpTransport,
} from './types';
import {
  parseHttpPacket,
  findHeaderInRawMessage,
  HTTP_REQUEST_TYPE,
  HTTP_RESPONSE_TYPE,
} from './genericHttpParser';
import {
  buildMSearchMessage,
  udpSsdpTransportFactory,
  DEFAULT_MX_SECONDS,
  SSDP_MULTICAST_ADDRESS,
  SSDP_PORT,
  ZONE_PLAYER_SEARCH_TARGET,
} from './ssdpSocketManager';
import { parseDeviceDescription } from './descriptorParser';
import { createModuleLogger } from './logger';
import { delay } from './utils';

const logger = createModuleLogger('DiscoveryClient');

const DEFAULT_TIMEOUT_MS = 5000;
const DEFAULT_FETCH_TIMEOUT_MS = 3000;

/**
 * @hebrew מבצע מעבר גילוי אחד: M-SEARCH יחיד, איסוף תגובות עד דדליין קבוע,
 * הסרת כפילויות לפי LOCATION, שליפת מסמכי התיאור ובניית מפה לפי stableId.
 *
 * אירועים:
 * - `advertisement` (adv: DiscoveryAdvertisement) לכל תגובה שהתקבלה, כולל כפולות.
 * - `devicefound` (record: DeviceRecord) לכל מסמך תיאור שפוענח בהצלחה.
 */
export class DiscoveryClient extends EventEmitter {
  private readonly options: Required<DiscoveryClientOptions>;

  constructor(options?: DiscoveryClientOptions) {
    super();

    this.options = {
      timeoutMs: options?.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      fetchTimeoutMs: options?.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS,
      searchTarget: options?.searchTarget ?? ZONE_PLAYER_SEARCH_TARGET,
      mx: options?.mx ?? DEFAULT_MX_SECONDS,
      transportFactory: options?.transportFactory ?? udpSsdpTransportFactory,
    };
  }

  /**
   * @hebrew מחלץ את כתובת ה-LOCATION מתגובת גילוי.
   * @returns null כשאין בהודעה LOCATION.
   */
  private _parseAdvertisement(msg: Buffer, rinfo: RemoteInfo): DiscoveryAdvertisement | null {
    const msgString = msg.toString('utf-8');
    const parserType = msgString.startsWith('HTTP/') ? HTTP_RESPONSE_TYPE : HTTP_REQUEST_TYPE;
    const parsedPacket = parseHttpPacket(msg, parserType);

    const location = (parsedPacket?.headers['location'] ?? findHeaderInRawMessage(msgString, 'LOCATION'))?.trim();
    if (!location) {
      logger.debug('_parseAdvertisement: Datagram without LOCATION header ignored.', { remoteAddress: rinfo.address });
      return null;
    }

    const usn = parsedPacket?.headers['usn'] ?? findHeaderInRawMessage(msgString, 'USN');
    return {
      location,
      usn: usn || undefined,
      remoteAddress: rinfo.address,
      remotePort: rinfo.port,
    };
  }

  private async _fetchDescriptor(location: string): Promise<DeviceRecord | null> {
    logger.debug(`_fetchDescriptor: Fetching device description from: ${location}`);
    try {
      const response = await axios.get<string>(location, {
        responseType: 'text',
        timeout: this.options.fetchTimeoutMs,
      });

      if (typeof response.data !== 'string') {
        logger.warn(`_fetchDescriptor: Non-text body received from ${location}`);
        return null;
      }
      return await parseDeviceDescription(response.data, location);
    } catch (err) {
      logger.warn(`_fetchDescriptor: Failed to fetch device description from ${location}`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  /**
   * @hebrew מריץ מעבר גילוי ומחזיר את המפה המלאה שתחליף את הרישום.
   * כשל בקשירת הסוקט נזרק (שגיאת תצורה); כל כשל אחר נרשם ומדולג.
   * @param timeoutMs - חלון האיסוף. דדליין קשיח מרגע השליחה.
   */
  public async discover(timeoutMs: number = this.options.timeoutMs): Promise<Map<string, DeviceRecord>> {
    const locations = new Set<string>();

    const onMessage = (msg: Buffer, rinfo: RemoteInfo) => {
      const advertisement = this._parseAdvertisement(msg, rinfo);
      if (!advertisement) return;
      this.emit('advertisement', advertisement);
      if (!locations.has(advertisement.location)) {
        logger.trace(`discover: New location ${advertisement.location} from ${rinfo.address}:${rinfo.port}`);
        locations.add(advertisement.location);
      }
    };

    const onError = (err: Error) => {
      logger.warn('discover: Socket error during discovery window', err);
    };

    const transport: SsdpTransport = await this.options.transportFactory('search', onMessage, onError);

    try {
      const searchMessage = Buffer.from(buildMSearchMessage(this.options.searchTarget, this.options.mx));
      try {
        await transport.send(searchMessage, SSDP_PORT, SSDP_MULTICAST_ADDRESS);
        logger.debug(`discover: M-SEARCH sent for ${this.options.searchTarget}, collecting responses for ${timeoutMs}ms`);
      } catch (err) {
        logger.error('discover: Failed to send M-SEARCH, returning an empty result', err);
        return new Map();
      }

      await delay(timeoutMs);
    } finally {
      await transport.close();
    }

    // הסט מוקפא כאן: תגובות מאוחרות לא נכנסות למעבר הזה
    const uniqueLocations = [...locations];
    logger.debug(`discover: ${uniqueLocations.length} unique location(s) collected`);

    const records = await Promise.all(uniqueLocations.map(location => this._fetchDescriptor(location)));

    const devices = new Map<string, DeviceRecord>();
    for (const record of records) {
      if (!record) continue;
      const previous = devices.get(record.stableId);
      if (previous) {
        logger.warn(`discover: Stable id collision on "${record.stableId}", "${record.displayName}" at ${record.controlBaseUrl} replaces "${previous.displayName}" at ${previous.controlBaseUrl}`);
      }
      devices.set(record.stableId, record);
      this.emit('devicefound', record);
    }

    logger.info(`discover: Pass finished with ${devices.size} device(s)`);
    return devices;
  }
}
