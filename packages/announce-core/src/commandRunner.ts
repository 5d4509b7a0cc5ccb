import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

const COMMAND_TIMEOUT_MS = 60 * 1000;

/**
 * @hebrew מריץ פקודה חיצונית. מוזרק כדי שבדיקות לא יריצו תהליכים אמיתיים.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<void>;

export const execFileRunner: CommandRunner = async (command, args) => {
  await execFileAsync(command, args, { timeout: COMMAND_TIMEOUT_MS });
};
