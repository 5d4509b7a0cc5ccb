import { ControlActionError } from '@lan-announcer/core';

/**
 * @hebrew מזהה רמקול שאינו ברישום. נפרד מכשל בקרה.
 */
export class SpeakerNotFoundError extends Error {
  readonly statusCode = 404;

  constructor(public readonly target: string) {
    super(`speaker "${target}" not found`);
    this.name = 'SpeakerNotFoundError';
  }
}

export class InvalidAnnouncementError extends Error {
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidAnnouncementError';
  }
}

export class AudioProductionError extends Error {
  readonly statusCode = 500;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AudioProductionError';
  }
}

export interface AnnouncementAttempt {
  id: string;
  name: string;
  ok: boolean;
  error?: string;
}

/**
 * @hebrew לפחות התקן אחד נכשל בשידור לכולם. כל ההתקנים נוסו; ההודעה היא של הכשל האחרון.
 */
export class AnnouncementFanOutError extends Error {
  readonly statusCode = 502;

  constructor(
    public readonly attempts: AnnouncementAttempt[],
    public readonly lastFailure: Error,
  ) {
    super(lastFailure.message, { cause: lastFailure });
    this.name = 'AnnouncementFanOutError';
  }
}

/**
 * @hebrew קוד ה-HTTP עבור שגיאה שהגיעה ל-API.
 */
export function statusCodeFor(error: unknown): number {
  if (error instanceof ControlActionError) {
    return 502;
  }
  if (
    error instanceof SpeakerNotFoundError ||
    error instanceof InvalidAnnouncementError ||
    error instanceof AudioProductionError ||
    error instanceof AnnouncementFanOutError
  ) {
    return error.statusCode;
  }
  return 500;
}
