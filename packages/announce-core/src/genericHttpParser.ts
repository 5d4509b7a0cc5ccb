import { HTTPParser } from 'http-parser-js';
import { createModuleLogger } from './logger';

export const HTTP_REQUEST_TYPE = HTTPParser.REQUEST;
export const HTTP_RESPONSE_TYPE = HTTPParser.RESPONSE;

export type HttpParserType = typeof HTTP_REQUEST_TYPE | typeof HTTP_RESPONSE_TYPE;

const logger = createModuleLogger('genericHttpParser');

export interface ParsedHttpPacket {
  method?: string;
  url?: string;
  versionMajor?: number;
  versionMinor?: number;
  /** שמות הכותרות באותיות קטנות */
  headers: Record<string, string>;
  body?: Buffer;
  // עבור תגובות
  statusCode?: number;
  statusMessage?: string;
}

/**
 * @hebrew מנתח הודעת HTTP גולמית (כמו הודעות SSDP שמגיעות ב-UDP) באמצעות http-parser-js.
 * @param messageBuffer - הבאפר המכיל את ההודעה.
 * @param parserType - REQUEST (M-SEARCH, NOTIFY) או RESPONSE (תשובה ל-M-SEARCH).
 * @returns ParsedHttpPacket אם הפירסור הושלם, אחרת null.
 */
export function parseHttpPacket(
  messageBuffer: Buffer,
  parserType: HttpParserType
): ParsedHttpPacket | null {
  const parser = new HTTPParser(parserType);

  let method: string | undefined;
  let url: string | undefined;
  let versionMajor: number | undefined;
  let versionMinor: number | undefined;
  const headers: Record<string, string> = {};
  const bodyChunks: Buffer[] = [];
  let complete = false;
  let statusCode: number | undefined;
  let statusMessage: string | undefined;

  parser[HTTPParser.kOnHeadersComplete] = (info) => {
    const rawHeaders = info.headers;
    for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
      headers[rawHeaders[i].toLowerCase()] = rawHeaders[i + 1];
    }

    if (parserType === HTTP_REQUEST_TYPE) {
      method = HTTPParser.methods[info.method];
      url = info.url;
    } else {
      statusCode = info.statusCode;
      statusMessage = info.statusMessage;
    }
    versionMajor = info.versionMajor;
    versionMinor = info.versionMinor;
  };

  parser[HTTPParser.kOnBody] = (chunk, offset, length) => {
    bodyChunks.push(Buffer.from(chunk.subarray(offset, offset + length)));
  };

  parser[HTTPParser.kOnMessageComplete] = () => {
    complete = true;
  };

  try {
    const executeResult = parser.execute(messageBuffer);
    if (executeResult instanceof Error) {
      logger.debug('parseHttpPacket: parser.execute() returned an error', { error: executeResult.message });
      return null;
    }

    if (executeResult !== messageBuffer.length) {
      logger.trace(`parseHttpPacket: Parser did not consume entire buffer. Parsed: ${executeResult}, Buffer length: ${messageBuffer.length}`);
    }

    // תגובות SSDP מגיעות בלי Content-Length; finish() סוגר את הגוף
    const finishResult = parser.finish();
    if (finishResult instanceof Error) {
      logger.debug('parseHttpPacket: parser.finish() returned an error', { error: finishResult.message });
      return null;
    }
  } catch (err: unknown) {
    logger.debug('parseHttpPacket: Exception during parsing process', {
      error: err instanceof Error ? err.message : String(err),
    });
    return null;
  }

  if (!complete) {
    logger.debug('parseHttpPacket: Parsing did not complete (kOnMessageComplete not called).');
    return null;
  }

  const result: ParsedHttpPacket = {
    headers,
    versionMajor,
    versionMinor,
  };

  if (bodyChunks.length > 0) {
    result.body = Buffer.concat(bodyChunks);
  }

  if (parserType === HTTP_REQUEST_TYPE) {
    result.method = method;
    result.url = url;
  } else {
    result.statusCode = statusCode;
    result.statusMessage = statusMessage;
  }

  return result;
}

/**
 * @hebrew חיפוש כותרת בשורות ההודעה, ללא תלות ברישיות. משמש כגיבוי כשהפרסר נכשל
 * על הודעה שאינה תקנית לגמרי.
 * @returns ערך הכותרת אחרי trim, או undefined.
 */
export function findHeaderInRawMessage(message: string, headerName: string): string | undefined {
  const prefix = `${headerName.toUpperCase()}:`;
  for (const line of message.split(/\r?\n/)) {
    if (line.toUpperCase().startsWith(prefix)) {
      return line.substring(prefix.length).trim();
    }
  }
  return undefined;
}
