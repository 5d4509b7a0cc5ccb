import * as winston from 'winston';
import { Logtail } from '@logtail/node';
import { LogtailTransport } from '@logtail/winston';
import type { ILogtailLog } from '@logtail/types';

/*
```ps
$env:LOG_MODULES = "DiscoveryClient,ControlClient"
$env:LOG_HIDE_MODULES = "genericHttpParser"
$env:LOG_LEVEL = "debug"
```
*/

// רמות הלוג. trace מחליף את http, verbose ו-silly של winston.
const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

export type LogLevel = keyof typeof logLevels;

/**
 * @hebrew לוגר של winston עם מתודה לכל אחת מהרמות המותאמות אישית.
 */
export type ModuleLogger = winston.Logger & {
  [level in LogLevel]: winston.LeveledLogMethod;
};

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'blue',
  trace: 'magenta',
};

winston.addColors(logColors);

const LOG_FILE_MAX_SIZE = 5 * 1024 * 1024;
const LOG_FILE_MAX_FILES = 5;

function splitModuleList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map(m => m.trim()).filter(m => m.length > 0);
}

function isConsoleEnabled(): boolean {
  return process.env.LOG_TO_CONSOLE === undefined || process.env.LOG_TO_CONSOLE === 'true';
}

// --- פורמטים ---

// הסתרת מודולים שמופיעים ב-LOG_HIDE_MODULES
const hideByModuleNameFormat = winston.format((info) => {
  const hidden = splitModuleList(process.env.LOG_HIDE_MODULES);
  if (hidden.length > 0 && typeof info.label === 'string' && hidden.includes(info.label)) {
    return false;
  }
  return info;
});

// הצגה סלקטיבית לפי LOG_MODULES ("*" או ריק = הכל)
const filterByModuleNameFormat = winston.format((info) => {
  const raw = process.env.LOG_MODULES?.trim();
  if (!raw || raw === '*') {
    return info;
  }
  const allowed = splitModuleList(raw);
  if (allowed.length > 0 && typeof info.label === 'string' && !allowed.includes(info.label)) {
    return false;
  }
  return info;
});

function isErrorLike(value: object): value is Record<string, unknown> {
  return ['message', 'code', 'stack', 'errno', 'syscall', 'address', 'port'].some(key => key in value);
}

/**
 * @hebrew ממיר את המטא-דאטה של רשומת לוג למחרוזת key=value, כולל טיפול בשגיאות.
 * @returns מחרוזת עם רווח מוביל, או מחרוזת ריקה כשאין מטא-דאטה.
 */
export function formatLogMetadata(metadata: Record<string, unknown>): string {
  const entries = Object.entries(metadata);
  if (entries.length === 0) {
    return '';
  }

  const metaString = entries
    .map(([key, value]) => {
      if (value instanceof Error) {
        return `${key}=Error: ${value.message}${value.stack ? `\nStack: ${value.stack}` : ''}`;
      }
      if (typeof value === 'object' && value !== null && isErrorLike(value)) {
        const parts: string[] = [];
        if (value.message) parts.push(`message: "${String(value.message)}"`);
        if ('code' in value) parts.push(`code: "${String(value.code)}"`);
        if ('errno' in value) parts.push(`errno: ${String(value.errno)}`);
        if ('syscall' in value) parts.push(`syscall: "${String(value.syscall)}"`);
        if ('address' in value) parts.push(`address: "${String(value.address)}"`);
        if ('port' in value) parts.push(`port: ${String(value.port)}`);
        let errMsg = `${key}=PotentialError: { ${parts.join(', ')} }`;
        if (value.stack) {
          errMsg += `\nStack: ${String(value.stack)}`;
        }
        return errMsg;
      }
      try {
        return `${key}=${JSON.stringify(value)}`;
      } catch {
        return `${key}=[UnstringifiableObject]`;
      }
    })
    .join(' ');

  return metaString ? ` ${metaString}` : '';
}

// מפריד בין השדות הקבועים של הרשומה לבין המטא-דאטה החופשית
function splitInfo(info: winston.Logform.TransformableInfo): { meta: Record<string, unknown>; stack?: string } {
  const meta: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(info)) {
    if (['level', 'message', 'timestamp', 'label', 'module', 'environment', 'stack'].includes(key)) continue;
    meta[key] = value;
  }
  return { meta, stack: typeof info.stack === 'string' ? info.stack : undefined };
}

function renderLine(info: winston.Logform.TransformableInfo, levelString: string): string {
  const environment = typeof info.environment === 'string' ? info.environment.toUpperCase() : 'UNKNOWN';
  let line = `${String(info.timestamp)} [${environment}] [${levelString}]`;
  if (typeof info.module === 'string') {
    line += ` (${info.module})`;
  }
  line += `: ${String(info.message)}`;

  const { meta, stack } = splitInfo(info);
  line += formatLogMetadata(meta);
  if (stack) {
    line += `\n${stack}`;
  }
  return line;
}

// פורמט טקסט ללא צבעים (לקובץ)
export const fileFormat = () => winston.format.combine(
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => {
    const originalLevel = info[Symbol.for('level')];
    const levelString = typeof originalLevel === 'string' ? originalLevel.toUpperCase() : 'UNKNOWN_LEVEL';
    return renderLine(info, levelString);
  })
);

// פורמט לקונסולה
export const consoleFormat = () => winston.format.combine(
  winston.format.padLevels(),
  hideByModuleNameFormat(),
  filterByModuleNameFormat(),
  winston.format.printf((info) => renderLine(info, info.level.toUpperCase())),
  winston.format.colorize({ colors: logColors, message: true, level: true, all: true }),
);

// --- טרנספורטים ---

function createFileTransport(filePath?: string): winston.transport {
  return new winston.transports.File({
    filename: filePath || process.env.LOG_FILE_PATH || 'logs/app.log',
    format: fileFormat(),
    maxsize: LOG_FILE_MAX_SIZE,
    maxFiles: LOG_FILE_MAX_FILES,
    tailable: true,
  });
}

/**
 * @hebrew יוצר טרנספורט של Logtail כאשר LOG_TO_LOGTAIL=true והטוקנים מוגדרים.
 * @returns הטרנספורט, או null אם Logtail כבוי או שהאתחול נכשל.
 */
function setupLogtailTransport(moduleName: string, environment: string): winston.transport | null {
  const sourceToken = process.env.LOGTAIL_SOURCE_TOKEN;
  const ingestingHost = process.env.LOGTAIL_INGESTING_HOST;

  if (process.env.LOG_TO_LOGTAIL !== 'true') {
    return null;
  }

  if (!sourceToken || !ingestingHost) {
    if (isConsoleEnabled()) {
      // הלוגר עוד לא קיים בשלב הזה
      console.warn(`[LoggerSetup] LOG_TO_LOGTAIL=true but LOGTAIL_SOURCE_TOKEN or LOGTAIL_INGESTING_HOST is missing (module: ${moduleName}, environment: ${environment}).`);
    }
    return null;
  }

  try {
    const logtail = new Logtail(sourceToken, { endpoint: `https://${ingestingHost}` });
    const envLocation = process.env.ENV_LOCATION;

    // Logtail לא מכיר את רמת trace, ממופה ל-debug תוך שמירת הרמה המקורית
    async function addCustomContext(log: ILogtailLog): Promise<ILogtailLog> {
      const withContext: ILogtailLog = { ...log };
      if (envLocation) {
        Object.assign(withContext, { env_location: envLocation });
      }
      if (String(withContext.level) === 'trace') {
        Object.assign(withContext, { original_level: 'trace', level: 'debug' });
      }
      return withContext;
    }

    logtail.use(addCustomContext);
    return new LogtailTransport(logtail);
  } catch (error) {
    console.warn(`[LoggerSetup] Failed to initialize Logtail transport for module: ${moduleName}.`, error);
    return null;
  }
}

/**
 * @hebrew יוצר לוגר עבור מודול. כל רשומה מקבלת את שם המודול והסביבה (NODE_ENV).
 * הטרנספורטים נקבעים לפי LOG_TO_CONSOLE, LOG_TO_FILE ו-LOG_TO_LOGTAIL.
 */
export function createModuleLogger(moduleName: string): ModuleLogger {
  const environment = process.env.NODE_ENV || 'unknown';
  const fileLogging = process.env.LOG_TO_FILE === 'true';
  const activeTransports: winston.transport[] = [];

  if (isConsoleEnabled()) {
    activeTransports.push(new winston.transports.Console({ format: consoleFormat() }));
  }

  if (fileLogging) {
    activeTransports.push(createFileTransport());
  }

  const logtailTransport = setupLogtailTransport(moduleName, environment);
  if (logtailTransport) {
    activeTransports.push(logtailTransport);
  }

  const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    levels: logLevels,
    silent: activeTransports.length === 0,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format((info) => {
        info.environment = environment;
        info.module = moduleName;
        // הפילטרים של המודולים עובדים על label
        info.label = moduleName;
        return info;
      })(),
      winston.format.errors({ stack: true })
    ),
    transports: activeTransports,
    exceptionHandlers: fileLogging
      ? [createFileTransport(process.env.LOG_EXCEPTIONS_PATH || 'logs/exceptions.log')]
      : undefined,
    rejectionHandlers: fileLogging
      ? [createFileTransport(process.env.LOG_REJECTIONS_PATH || 'logs/rejections.log')]
      : undefined,
    exitOnError: false,
  });

  // createLogger מחזיר טיפוס שלא מכיר את הרמות המותאמות
  return logger as ModuleLogger;
}

export default createModuleLogger;
