import type { ProcessedEnv } from './envLoader';
import { createModuleLogger } from './logger';

const logger = createModuleLogger('configLoader');

export type ConfigLeaf = string | number | boolean;

export interface ConfigTree {
  [key: string]: ConfigLeaf | ConfigTree;
}

// פונקציית עזר להמרת camelCase ל-SNAKE_CASE
export const camelToSnakeCase = (str: string) => str.replace(/[A-Z]/g, letter => `_${letter}`).toUpperCase();

/**
 * @hebrew שם משתנה הסביבה שדורס עלה בתצורה.
 * @example envVarNameFor(['discovery', 'timeoutMs']) // 'DISCOVERY_TIMEOUT_MS'
 */
export function envVarNameFor(configPath: string[]): string {
  return configPath.map(camelToSnakeCase).join('_');
}

/**
 * @hebrew ממיר ערך ממשתנה סביבה לטיפוס של ערך ברירת המחדל.
 * @returns undefined כשהערך לא מתאים לטיפוס.
 */
function coerceToDefaultType(raw: string | number, defaultValue: ConfigLeaf): ConfigLeaf | undefined {
  switch (typeof defaultValue) {
    case 'number': {
      if (typeof raw === 'number') return raw;
      // "1.0" או "0080" לא הומרו ב-getProcessedEnv
      const parsed = raw.trim() === '' ? NaN : Number(raw);
      return isFinite(parsed) ? parsed : undefined;
    }
    case 'boolean':
      if (raw === 'true') return true;
      if (raw === 'false') return false;
      return undefined;
    default:
      return String(raw);
  }
}

/**
 * פונקציה רקורסיבית שמאתחלת את התצורה.
 * היא עוברת על אובייקט ברירות המחדל, ומחפשת משתני סביבה תואמים
 * כדי לדרוס את הערכים.
 * @param defaultConfig - אובייקט עם ערכי ברירת המחדל.
 * @param env - משתני הסביבה אחרי המרת המספרים.
 * @param path - הנתיב הנוכחי באובייקט (לשימוש רקורסיבי).
 */
export function initializeConfig<T extends ConfigTree>(defaultConfig: T, env: ProcessedEnv, path: string[] = []): T {
  const initializedConfig: ConfigTree = {};

  for (const [key, value] of Object.entries(defaultConfig)) {
    const newPath = [...path, key];

    if (typeof value === 'object') {
      initializedConfig[key] = initializeConfig(value, env, newPath);
      continue;
    }

    const envVarName = envVarNameFor(newPath);
    const raw = env[envVarName];
    if (raw === undefined) {
      initializedConfig[key] = value;
      continue;
    }

    const coerced = coerceToDefaultType(raw, value);
    if (coerced === undefined) {
      logger.warn(`initializeConfig: Ignoring ${envVarName}=${raw}, expected a ${typeof value}`);
      initializedConfig[key] = value;
    } else {
      initializedConfig[key] = coerced;
    }
  }

  // המבנה זהה ל-defaultConfig, רק הערכים הוחלפו בערכים מאותו טיפוס
  return initializedConfig as T;
}
