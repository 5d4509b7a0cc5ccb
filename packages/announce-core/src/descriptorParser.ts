import * as xml2js from 'xml2js';

import type { DeviceRecord } from './types';
import { createModuleLogger } from './logger';

const logger = createModuleLogger('descriptorParser');

const SCHEME_SEPARATOR = '://';

type XmlNode = Record<string, unknown>;

function isXmlNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * @hebrew מחזיר את הטקסט של שדה בצומת, אחרי trim.
 * xml2js מחזיר אובייקט ריק עבור תגית ריקה (`<roomName/>`) ואובייקט עם '_' כשיש לתגית מאפיינים.
 */
function getText(node: XmlNode, propertyName: string): string {
  const value = node[propertyName];
  if (typeof value === 'string') {
    return value.trim();
  }
  if (isXmlNode(value) && typeof value._ === 'string') {
    return value._.trim();
  }
  return '';
}

/**
 * @hebrew המזהה היציב של התקן: השם באותיות קטנות ללא תווי רווח.
 * @example deriveStableId('Living Room') // 'livingroom'
 */
export function deriveStableId(displayName: string): string {
  return displayName.toLowerCase().split(' ').join('');
}

/**
 * @hebrew חותך את כתובת מסמך התיאור אחרי ה-host:port.
 * @returns הכתובת ללא נתיב, או null אם אין בה "://".
 * @example deriveControlBaseUrl('http://192.168.1.10:1400/xml/device.xml') // 'http://192.168.1.10:1400'
 */
export function deriveControlBaseUrl(location: string): string | null {
  const schemeEnd = location.indexOf(SCHEME_SEPARATOR);
  if (schemeEnd < 0) {
    return null;
  }
  const pathStart = location.indexOf('/', schemeEnd + SCHEME_SEPARATOR.length);
  return pathStart < 0 ? location : location.substring(0, pathStart);
}

/**
 * @hebrew מנתח מסמך תיאור של התקן לרשומת DeviceRecord.
 * כל כישלון (XML פגום, שם חסר, כתובת לא תקינה) מחזיר null ונרשם בלוג, כדי שמעבר הגילוי ימשיך.
 * @param xmlData - תוכן מסמך התיאור.
 * @param location - הכתובת שממנה הגיע המסמך (ערך ה-LOCATION מתגובת הגילוי).
 */
export async function parseDeviceDescription(
  xmlData: string,
  location: string
): Promise<DeviceRecord | null> {
  const controlBaseUrl = deriveControlBaseUrl(location);
  if (controlBaseUrl === null) {
    logger.warn(`parseDeviceDescription: Location without scheme separator, skipping: ${location}`);
    return null;
  }

  const parser = new xml2js.Parser({
    explicitArray: false,
    explicitRoot: false,
    tagNameProcessors: [xml2js.processors.stripPrefix],
  });

  let result: unknown;
  try {
    result = await parser.parseStringPromise(xmlData);
  } catch (err) {
    logger.warn(`parseDeviceDescription: Malformed device description XML from ${location}`, {
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }

  if (!isXmlNode(result) || !isXmlNode(result.device)) {
    logger.warn(`parseDeviceDescription: Missing 'device' element in description from ${location}`);
    return null;
  }

  const deviceNode = result.device;
  const displayName = getText(deviceNode, 'roomName') || getText(deviceNode, 'displayName');
  if (!displayName) {
    logger.debug(`parseDeviceDescription: Neither roomName nor displayName present at ${location}`);
    return null;
  }

  const record: DeviceRecord = Object.freeze({
    displayName,
    stableId: deriveStableId(displayName),
    controlBaseUrl,
  });
  logger.trace(`parseDeviceDescription: Parsed ${record.stableId} from ${location}`, { record });
  return record;
}
