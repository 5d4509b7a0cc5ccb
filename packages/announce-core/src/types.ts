// הגדרות הטיפוסים המשותפות לגילוי ולשליטה ברמקולים.
import type { RemoteInfo } from 'node:dgram';

/**
 * @hebrew רשומת התקן שנבנתה ממסמך התיאור שלו. אובייקט ערך בלתי ניתן לשינוי.
 */
export interface DeviceRecord {
  /** השם כפי שהוגדר בהתקן (roomName, ואם חסר displayName). */
  readonly displayName: string;
  /** displayName באותיות קטנות וללא רווחים, למשל "livingroom". */
  readonly stableId: string;
  /** scheme://host:port של כתובת מסמך התיאור, ללא נתיב. */
  readonly controlBaseUrl: string;
}

/**
 * @hebrew תגובת גילוי בודדת שהגיעה מהרשת. יכולות להגיע כמה לכל התקן.
 */
export interface DiscoveryAdvertisement {
  location: string;
  usn?: string;
  remoteAddress: string;
  remotePort: number;
}

/**
 * @hebrew תפקיד הסוקט: 'search' שולח M-SEARCH ומקבל תגובות unicast,
 * 'listen' מאזין לקבוצת ה-multicast (צד האמולטור).
 */
export type SsdpSocketRole = 'search' | 'listen';

export type SsdpMessageHandler = (msg: Buffer, rinfo: RemoteInfo) => void;

export type SsdpErrorHandler = (err: Error) => void;

export interface SsdpTransport {
  send(message: Buffer, port: number, address: string): Promise<void>;
  close(): Promise<void>;
  address(): { address: string; port: number };
}

export type SsdpTransportFactory = (
  role: SsdpSocketRole,
  onMessage: SsdpMessageHandler,
  onError: SsdpErrorHandler,
) => Promise<SsdpTransport>;

export interface DiscoveryClientOptions {
  /**
   * @hebrew חלון האיסוף (במילישניות). דדליין קשיח לכל המעבר, לא idle timeout.
   * @default 5000
   */
  timeoutMs?: number;
  /**
   * @default 3000
   */
  fetchTimeoutMs?: number;
  /**
   * @default "urn:schemas-upnp-org:device:ZonePlayer:1"
   */
  searchTarget?: string;
  /**
   * @default 3
   */
  mx?: number;
  /**
   * @hebrew יצירת הסוקט. ברירת המחדל היא UDP אמיתי; בבדיקות מוזרקת רשת בזיכרון.
   */
  transportFactory?: SsdpTransportFactory;
}

export interface ControlClientOptions {
  /**
   * @hebrew המתנה בין SetAVTransportURI ל-Play כדי לאפשר להתקן לטעון את המדיה.
   * @default 300
   */
  settleDelayMs?: number;
  /**
   * @default 10000
   */
  requestTimeoutMs?: number;
}

export type AVTransportAction = 'SetAVTransportURI' | 'Play';
