import fs from 'node:fs/promises';
import path from 'node:path';

import { createModuleLogger, execFileRunner, type CommandRunner } from '@lan-announcer/core';
import { AudioProductionError } from './errors';

const logger = createModuleLogger('AudioProducer');

/**
 * @hebrew ממיר טקסט לקובץ שמע.
 * @returns הנתיב לקובץ שנוצר, בתוך תיקיית המדיה.
 */
export interface AudioProducer {
  produceAudio(text: string): Promise<string>;
}

/**
 * שם קובץ לפי הזמן הנוכחי בננו-שניות.
 */
export function nanosecondFileName(): string {
  const subMillisecond = process.hrtime.bigint() % 1_000_000n;
  return `${BigInt(Date.now()) * 1_000_000n + subMillisecond}`;
}

export interface SpeechCommandAudioProducerOptions {
  outputDir: string;
  /** קול ל-say (-v). ריק = קול המערכת */
  voice?: string;
  runCommand?: CommandRunner;
  fileName?: () => string;
}

/**
 * @hebrew מפיק שמע בעזרת הפקודות say ו-afconvert.
 * say כותב AIFF, שמומר ל-MP3; אם קידוד MP3 לא זמין, ממירים ל-AAC בקובץ m4a.
 */
export class SpeechCommandAudioProducer implements AudioProducer {
  private readonly runCommand: CommandRunner;
  private readonly fileName: () => string;

  constructor(private readonly options: SpeechCommandAudioProducerOptions) {
    this.runCommand = options.runCommand ?? execFileRunner;
    this.fileName = options.fileName ?? nanosecondFileName;
  }

  public async produceAudio(text: string): Promise<string> {
    const baseName = this.fileName();
    const aiffPath = path.join(this.options.outputDir, `${baseName}.aiff`);
    const mp3Path = path.join(this.options.outputDir, `${baseName}.mp3`);
    const m4aPath = path.join(this.options.outputDir, `${baseName}.m4a`);

    const sayArgs = this.options.voice ? ['-v', this.options.voice] : [];
    try {
      await this.runCommand('say', [...sayArgs, '-o', aiffPath, text]);
    } catch (err) {
      throw new AudioProductionError(`say failed: ${errorMessage(err)}`, { cause: err });
    }

    let outputPath = mp3Path;
    try {
      await this.runCommand('afconvert', ['-f', 'MPG3', '-d', '.mp3', aiffPath, mp3Path]);
    } catch (mp3Error) {
      logger.debug(`produceAudio: MP3 conversion failed, falling back to AAC`, { error: errorMessage(mp3Error) });
      outputPath = m4aPath;
      try {
        await this.runCommand('afconvert', ['-f', 'mp4f', '-d', 'aac', aiffPath, m4aPath]);
      } catch (aacError) {
        await this.removeQuietly(aiffPath);
        throw new AudioProductionError(
          `afconvert failed (mp3: ${errorMessage(mp3Error)}, aac: ${errorMessage(aacError)})`,
          { cause: aacError }
        );
      }
    }

    await this.removeQuietly(aiffPath);
    logger.debug(`produceAudio: Wrote ${outputPath}`);
    return outputPath;
  }

  private async removeQuietly(filePath: string): Promise<void> {
    try {
      await fs.rm(filePath, { force: true });
    } catch (err) {
      logger.warn(`removeQuietly: Could not remove ${filePath}`, { error: errorMessage(err) });
    }
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
