import axios from 'axios';

import type { AVTransportAction, ControlClientOptions, DeviceRecord } from './types';
import { escapeXml } from './xmlUtils';
import { createModuleLogger } from './logger';
import { delay } from './utils';

const logger = createModuleLogger('ControlClient');

export const AVTRANSPORT_SERVICE_TYPE = 'urn:schemas-upnp-org:service:AVTransport:1';
export const AVTRANSPORT_CONTROL_PATH = '/MediaRenderer/AVTransport/Control';
export const SOAP_CONTENT_TYPE = 'text/xml; charset="utf-8"';

const DEFAULT_SETTLE_DELAY_MS = 300;
const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

/**
 * @hebrew כשל בפעולת בקרה: סטטוס שאינו 200 או שגיאת רשת.
 */
export class ControlActionError extends Error {
  /** undefined כשהבקשה לא הגיעה לתגובת HTTP */
  public readonly status?: number;
  public readonly body?: string;

  constructor(
    public readonly action: AVTransportAction,
    message: string,
    details: { status?: number; body?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = 'ControlActionError';
    this.status = details.status;
    this.body = details.body;
  }
}

function wrapEnvelope(action: AVTransportAction, args: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/"
 s:encodingStyle="http://schemas.xmlsoap.org/soap/encoding/">
  <s:Body>
    <u:${action} xmlns:u="${AVTRANSPORT_SERVICE_TYPE}">
${args}
    </u:${action}>
  </s:Body>
</s:Envelope>`;
}

/**
 * @hebrew מעטפת SetAVTransportURI. ה-URL עובר escape לארבעת התווים & < > " בלבד.
 */
export function buildSetAVTransportURIEnvelope(mediaUrl: string): string {
  return wrapEnvelope('SetAVTransportURI', [
    '      <InstanceID>0</InstanceID>',
    `      <CurrentURI>${escapeXml(mediaUrl)}</CurrentURI>`,
    '      <CurrentURIMetaData></CurrentURIMetaData>',
  ].join('\n'));
}

export function buildPlayEnvelope(): string {
  return wrapEnvelope('Play', [
    '      <InstanceID>0</InstanceID>',
    '      <Speed>1</Speed>',
  ].join('\n'));
}

export function controlUrlFor(device: DeviceRecord): string {
  return device.controlBaseUrl + AVTRANSPORT_CONTROL_PATH;
}

/**
 * @hebrew לקוח הבקרה: רצף של שתי פעולות (קביעת מקור ואז ניגון) מול התקן אחד.
 * אין ניסיונות חוזרים; ההחלטה על ניסיון נוסף היא של הקורא.
 */
export class ControlClient {
  private readonly options: Required<ControlClientOptions>;

  constructor(options?: ControlClientOptions) {
    this.options = {
      settleDelayMs: options?.settleDelayMs ?? DEFAULT_SETTLE_DELAY_MS,
      requestTimeoutMs: options?.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
    };
  }

  /**
   * @hebrew שולח פעולת בקרה בודדת.
   * @throws ControlActionError על כל תגובה שאינה 200 או על שגיאת רשת.
   */
  public async sendControlAction(device: DeviceRecord, action: AVTransportAction, envelope: string): Promise<string> {
    const controlUrl = controlUrlFor(device);
    logger.debug(`sendControlAction: ${action} -> ${device.stableId} (${controlUrl})`);

    let status: number;
    let body: string;
    try {
      const response = await axios.post<string>(controlUrl, envelope, {
        headers: {
          'Content-Type': SOAP_CONTENT_TYPE,
          'SOAPAction': `${AVTRANSPORT_SERVICE_TYPE}#${action}`,
        },
        responseType: 'text',
        timeout: this.options.requestTimeoutMs,
        validateStatus: () => true,
      });
      status = response.status;
      body = typeof response.data === 'string' ? response.data : String(response.data);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`sendControlAction: ${action} on ${device.stableId} failed before a response`, { error: message });
      throw new ControlActionError(action, `${action}: ${message}`, { cause: err });
    }

    if (status !== 200) {
      logger.warn(`sendControlAction: ${action} on ${device.stableId} returned ${status}`, { body });
      throw new ControlActionError(action, `${action} returned ${status}: ${body}`, { status, body });
    }

    if (!body.includes(`${action}Response`)) {
      logger.warn(`sendControlAction: ${action} on ${device.stableId} answered 200 without ${action}Response`);
    }
    return body;
  }

  /**
   * @hebrew קובע את מקור המדיה, ממתין לזמן התייצבות קבוע ומפעיל ניגון.
   * Play לא נשלח אם SetAVTransportURI נכשל.
   */
  public async playAnnouncement(device: DeviceRecord, mediaUrl: string): Promise<void> {
    await this.sendControlAction(device, 'SetAVTransportURI', buildSetAVTransportURIEnvelope(mediaUrl));

    await delay(this.options.settleDelayMs);

    await this.sendControlAction(device, 'Play', buildPlayEnvelope());
    logger.info(`playAnnouncement: Playing ${mediaUrl} on ${device.displayName}`);
  }
}
