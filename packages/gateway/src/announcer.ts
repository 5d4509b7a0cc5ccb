import path from 'node:path';

import {
  createModuleLogger,
  type DeviceRecord,
  type DeviceRegistry,
} from '@lan-announcer/core';
import type { AudioProducer } from './audioProducer';
import {
  AnnouncementFanOutError,
  InvalidAnnouncementError,
  SpeakerNotFoundError,
  type AnnouncementAttempt,
} from './errors';

const logger = createModuleLogger('Announcer');

export const ALL_TARGET = 'all';

/**
 * @hebrew הצד של לקוח הבקרה שהשער צריך. ControlClient מממש אותו.
 */
export interface PlaybackClient {
  playAnnouncement(device: DeviceRecord, mediaUrl: string): Promise<void>;
}

export interface SpeakerSummary {
  name: string;
  id: string;
}

export interface AnnouncementResult {
  target: string;
  mediaUrl: string;
  attempts: AnnouncementAttempt[];
}

export interface AnnouncerOptions {
  registry: DeviceRegistry;
  playbackClient: PlaybackClient;
  audioProducer: AudioProducer;
  /** למשל http://192.168.1.5:8080 */
  mediaBaseUrl: string;
  /** התיקייה ששרת המדיה מגיש; נתיבי הקבצים נבנים יחסית אליה */
  mediaRoot: string;
}

/**
 * @hebrew נקודת הכניסה של חזיתות ה-API והצ'אט: הכרזה על רמקול אחד או על כולם.
 */
export class Announcer {
  constructor(private readonly options: AnnouncerOptions) {}

  /**
   * @hebrew רשימת הרמקולים לפי סדר הרישום.
   */
  public listDevices(): SpeakerSummary[] {
    return this.options.registry.list().map(device => ({ name: device.displayName, id: device.stableId }));
  }

  public hasSpeaker(id: string): boolean {
    return this.options.registry.lookup(id) !== undefined;
  }

  /**
   * @hebrew הכתובת שבה שרת המדיה מגיש קובץ. כל מקטע בנתיב מקודד בנפרד.
   */
  public buildMediaUrl(filePath: string): string {
    const relative = path.relative(this.options.mediaRoot, filePath);
    const encoded = relative.split(path.sep).map(segment => encodeURIComponent(segment)).join('/');
    return `${this.options.mediaBaseUrl.replace(/\/+$/, '')}/${encoded}`;
  }

  /**
   * @hebrew מפיק שמע מהטקסט ומנגן אותו.
   * @param target - מזהה יציב, או ריק / "all" לכל הרמקולים.
   * @throws InvalidAnnouncementError, SpeakerNotFoundError (לפני הפקת השמע),
   * ControlActionError ליעד בודד, AnnouncementFanOutError כשלפחות רמקול אחד נכשל.
   */
  public async announce(text: string, target: string = ALL_TARGET): Promise<AnnouncementResult> {
    const message = text.trim();
    if (!message) {
      throw new InvalidAnnouncementError('"text" is required');
    }

    const normalizedTarget = target.trim() || ALL_TARGET;
    const isFanOut = normalizedTarget === ALL_TARGET;

    // צילום של הרישום לכל ההכרזה: מעבר גילוי באמצע לא משנה את רשימת היעדים
    let devices: DeviceRecord[];
    if (isFanOut) {
      devices = this.options.registry.list();
    } else {
      const device = this.options.registry.lookup(normalizedTarget);
      if (!device) {
        throw new SpeakerNotFoundError(normalizedTarget);
      }
      devices = [device];
    }

    const filePath = await this.options.audioProducer.produceAudio(message);
    const mediaUrl = this.buildMediaUrl(filePath);
    logger.info(`announce: "${message}" -> ${normalizedTarget} (${mediaUrl})`);

    if (!isFanOut) {
      const [device] = devices;
      await this.options.playbackClient.playAnnouncement(device, mediaUrl);
      return {
        target: normalizedTarget,
        mediaUrl,
        attempts: [{ id: device.stableId, name: device.displayName, ok: true }],
      };
    }

    if (devices.length === 0) {
      logger.warn('announce: No speakers registered, nothing to play');
      return { target: normalizedTarget, mediaUrl, attempts: [] };
    }

    const outcomes = await Promise.allSettled(
      devices.map(device => this.options.playbackClient.playAnnouncement(device, mediaUrl))
    );

    let lastFailure: Error | undefined;
    const attempts: AnnouncementAttempt[] = [];
    for (const [index, outcome] of outcomes.entries()) {
      const device = devices[index];
      if (outcome.status === 'fulfilled') {
        attempts.push({ id: device.stableId, name: device.displayName, ok: true });
        continue;
      }
      const error = outcome.reason instanceof Error ? outcome.reason : new Error(String(outcome.reason));
      logger.error(`announce: Error playing on ${device.displayName}: ${error.message}`);
      attempts.push({ id: device.stableId, name: device.displayName, ok: false, error: error.message });
      lastFailure = error;
    }

    if (lastFailure) {
      throw new AnnouncementFanOutError(attempts, lastFailure);
    }
    return { target: normalizedTarget, mediaUrl, attempts };
  }
}
