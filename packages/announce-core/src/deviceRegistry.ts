import type { DeviceRecord } from './types';
import { createModuleLogger } from './logger';

const logger = createModuleLogger('DeviceRegistry');

/**
 * @hebrew מפה ממזהה יציב לרשומת התקן.
 *
 * ההחלפה בונה מפה חדשה ומחליפה את ההפניה בצעד סינכרוני אחד. ב-Node אין קוד אחר
 * שרץ באמצע צעד סינכרוני, ולכן קורא רואה תמיד את הסט הישן או את החדש במלואו.
 * המפה הפנימית לא נחשפת; קוראים מקבלים עותק קפוא.
 */
export class DeviceRegistry {
  private devices: ReadonlyMap<string, DeviceRecord> = new Map();
  private _generation = 0;

  /**
   * @hebrew מחליף את כל תוכן הרישום. המפתחות נבנים מחדש מ-stableId של כל רשומה,
   * כך שהמפתח תמיד תואם לרשומה. במקרה של התנגשות הרשומה האחרונה גוברת.
   * @example registry.replace((await client.discover()).values())
   */
  public replace(records: Iterable<DeviceRecord>): void {
    const next = new Map<string, DeviceRecord>();
    for (const record of records) {
      if (next.has(record.stableId)) {
        logger.warn(`replace: Duplicate stable id "${record.stableId}", keeping the last record`);
      }
      next.set(record.stableId, Object.isFrozen(record) ? record : Object.freeze({ ...record }));
    }

    this.devices = next;
    this._generation++;
    logger.debug(`replace: Registry replaced with ${next.size} device(s), generation ${this._generation}`);
  }

  /**
   * @returns הרשומות ממוינות לפי stableId.
   */
  public list(): DeviceRecord[] {
    return [...this.devices.values()].sort((a, b) => a.stableId.localeCompare(b.stableId));
  }

  public lookup(stableId: string): DeviceRecord | undefined {
    return this.devices.get(stableId);
  }

  /**
   * @hebrew המפה הנוכחית עצמה. בטוח לשמור אותה: replace לעולם לא משנה מפה קיימת.
   */
  public snapshot(): ReadonlyMap<string, DeviceRecord> {
    return this.devices;
  }

  public get size(): number {
    return this.devices.size;
  }

  /** מונה ההחלפות מאז היצירה */
  public get generation(): number {
    return this._generation;
  }
}
