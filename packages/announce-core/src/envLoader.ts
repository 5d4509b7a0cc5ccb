import dotenv from 'dotenv';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const currentDir = path.dirname(fileURLToPath(import.meta.url));

// קובץ ה-.env בשורש המאגר, ואחריו קובץ .env בתיקיית העבודה שדורס אותו
const rootEnvPath = path.resolve(currentDir, '../../../.env');
const localEnvPath = path.resolve(process.cwd(), '.env');

const loadEnvFile = (filePath: string, override: boolean = false) => {
  if (!fs.existsSync(filePath)) {
    return;
  }
  const result = dotenv.config({ path: filePath, override });
  if (result.error) {
    // הלוגר תלוי במשתני הסביבה ועוד לא נוצר
    console.warn(`[EnvLoader] Error loading .env file from ${filePath}:`, result.error.message);
  }
};

let loaded = false;

/**
 * @hebrew טוען את קבצי ה-.env פעם אחת לכל תהליך.
 */
export function loadEnvFiles(): void {
  if (loaded) return;
  loaded = true;
  loadEnvFile(rootEnvPath);
  if (localEnvPath !== rootEnvPath) {
    loadEnvFile(localEnvPath, true);
  }
}

export type ProcessedEnv = Record<string, string | number | undefined>;

/**
 * בודק אם מחרוזת ניתנת להמרה למספר ולחזרה לאותה מחרוזת בדיוק.
 * "9000" ו-"1.5" כן; "007", "1.0", "+1555" ו-"0x10" נשארים מחרוזות כדי שערכי מחרוזת לא ישתנו.
 */
export function isStringLosslesslyNumeric(value: string | undefined): value is string {
  if (value === undefined || value.trim() === '') {
    return false;
  }

  const num = Number(value);
  return isFinite(num) && String(num) === value;
}

/**
 * מעבד את משתני הסביבה וממיר ערכים מספריים למספרים.
 * @param source - ברירת המחדל היא process.env.
 */
export function getProcessedEnv(source: NodeJS.ProcessEnv = process.env): ProcessedEnv {
  const processed: ProcessedEnv = {};
  for (const [key, value] of Object.entries(source)) {
    processed[key] = isStringLosslesslyNumeric(value) ? Number(value) : value;
  }
  return processed;
}
