import { createModuleLogger, deriveStableId } from '@lan-announcer/core';
import { ALL_TARGET, type Announcer } from './announcer';

const logger = createModuleLogger('MessageDispatcher');

const SPEAKERS_COMMAND = '/speakers';

export interface MessageDispatcherOptions {
  /** ריק = כל השולחים */
  allowedSenderId?: string;
  /** כשמוגדר, רק /speakers@<botUsername> נענה בנוסף ל-/speakers */
  botUsername?: string;
}

/**
 * @hebrew מתרגם הודעת צ'אט לקריאה ל-announce או ל-listDevices.
 * @returns טקסט התשובה, או null כשאין לענות (שולח לא מורשה, הודעה ריקה, פקודה אחרת).
 */
export class MessageDispatcher {
  constructor(
    private readonly announcer: Announcer,
    private readonly options: MessageDispatcherOptions = {},
  ) {}

  public async onUserMessage(text: string, senderId?: string | number): Promise<string | null> {
    const allowed = this.options.allowedSenderId?.trim();
    if (allowed && String(senderId ?? '') !== allowed) {
      logger.debug(`onUserMessage: Ignoring message from unauthorized sender ${String(senderId)}`);
      return null;
    }

    const trimmed = text.trim();
    if (!trimmed) {
      return null;
    }

    if (this.isSpeakersCommand(trimmed)) {
      return this.describeSpeakers();
    }

    if (trimmed.startsWith('/')) {
      return null;
    }

    const { target, message } = this.splitTarget(trimmed);
    if (!message) {
      return 'Empty announcement text.';
    }

    logger.info(`onUserMessage: Announcement "${message}" -> ${target}`);
    try {
      await this.announcer.announce(message, target);
    } catch (err) {
      return `Error: ${err instanceof Error ? err.message : String(err)}`;
    }
    return `Announced on ${target}: ${message}`;
  }

  private isSpeakersCommand(text: string): boolean {
    if (text === SPEAKERS_COMMAND) return true;
    if (!text.startsWith(`${SPEAKERS_COMMAND}@`)) return false;
    const botUsername = this.options.botUsername?.trim();
    return !botUsername || text === `${SPEAKERS_COMMAND}@${botUsername}`;
  }

  private describeSpeakers(): string {
    const speakers = this.announcer.listDevices();
    if (speakers.length === 0) {
      return 'No speakers found.';
    }

    const lines = ['Available speakers:', ''];
    for (const speaker of speakers) {
      lines.push(`• ${speaker.name} → id: ${speaker.id}`);
    }
    lines.push('', 'Send:', `${speakers[0].id}: Dinner is ready`, 'OR just:', 'Dinner is ready');
    return lines.join('\n');
  }

  /**
   * "kitchen: Dinner is ready" מכוון ל-kitchen רק אם הוא רשום; אחרת כל הטקסט הולך לכולם.
   */
  private splitTarget(text: string): { target: string; message: string } {
    const separator = text.indexOf(':');
    if (separator > 0) {
      const candidateId = deriveStableId(text.substring(0, separator).trim());
      if (this.announcer.hasSpeaker(candidateId)) {
        return { target: candidateId, message: text.substring(separator + 1).trim() };
      }
    }
    return { target: ALL_TARGET, message: text };
  }
}
