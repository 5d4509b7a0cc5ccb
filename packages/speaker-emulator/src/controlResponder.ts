import { EventEmitter } from 'events';
import fs from 'node:fs/promises';
import type { Server } from 'node:http';
import os from 'node:os';
import path from 'node:path';
import express, { type Request, type Response } from 'express';
import axios from 'axios';
import { create } from 'xmlbuilder2';

import {
  createModuleLogger,
  execFileRunner,
  extractTagValue,
  AVTRANSPORT_CONTROL_PATH,
  AVTRANSPORT_SERVICE_TYPE,
  type CommandRunner,
} from '@lan-announcer/core';
import type { EmulatedSpeaker } from './emulatedSpeaker';
import { DEVICE_DESCRIPTION_PATH } from './discoveryResponder';

const logger = createModuleLogger('ControlResponder');

export const EMULATED_MODEL_NAME = 'ZonePlayer (Emulated)';

const XML_CONTENT_TYPE = 'text/xml; charset=utf-8';
const UNKNOWN_ACTION = 'Unknown';
const VALID_ACTION_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;
const DEFAULT_VERIFY_TIMEOUT_MS = 10000;
const LOCAL_PLAYER_COMMAND = 'afplay';
const DEFAULT_MEDIA_EXTENSION = '.mp3';

/**
 * @hebrew מה עושים עם כתובת המדיה ב-Play:
 * off - כלום, head - בקשת HEAD, fetch - הורדה מלאה של הקובץ,
 * play - הורדה לקובץ זמני והשמעה ברמקולים המקומיים עם afplay.
 */
export type MediaVerifyMode = 'off' | 'head' | 'fetch' | 'play';

export const MEDIA_VERIFY_MODES: readonly MediaVerifyMode[] = ['off', 'head', 'fetch', 'play'];

export function isMediaVerifyMode(value: string): value is MediaVerifyMode {
  return MEDIA_VERIFY_MODES.some(mode => mode === value);
}

export interface MediaVerification {
  speaker: string;
  uri: string;
  mode: Exclude<MediaVerifyMode, 'off'>;
  ok: boolean;
  status?: number;
  bytes?: number;
  error?: string;
}

export interface ControlResponderOptions {
  verify?: MediaVerifyMode;
  verifyTimeoutMs?: number;
  /** מריץ את afplay במצב play */
  runCommand?: CommandRunner;
  /** תיקיית הקבצים הזמניים של מצב play. ברירת המחדל: os.tmpdir() */
  tempDir?: string;
}

/**
 * @hebrew מסמך התיאור המינימלי של רמקול מדומה.
 */
export function buildDeviceDescription(name: string): string {
  return create({ version: '1.0', encoding: 'utf-8' })
    .ele('root', { xmlns: 'urn:schemas-upnp-org:device-1-0' })
    .ele('device')
    .ele('roomName').txt(name).up()
    .ele('displayName').txt(name).up()
    .ele('modelName').txt(EMULATED_MODEL_NAME).up()
    .up()
    .end({ prettyPrint: true });
}

/**
 * @hebrew שם הפעולה מתוך כותרת SOAPAction: מה שאחרי ה-# האחרון, בלי מרכאות.
 */
export function parseSoapActionName(soapAction: string): string {
  const hashIndex = soapAction.lastIndexOf('#');
  const action = hashIndex >= 0 ? soapAction.substring(hashIndex + 1) : soapAction;
  return action.replace(/^"+|"+$/g, '');
}

export function buildActionResponse(action: string): string {
  const responseName = VALID_ACTION_NAME.test(action) ? action : UNKNOWN_ACTION;
  return `<?xml version="1.0"?>
<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/">
  <s:Body>
    <u:${responseName}Response xmlns:u="${AVTRANSPORT_SERVICE_TYPE}"/>
  </s:Body>
</s:Envelope>`;
}

/**
 * @hebrew שרת HTTP של רמקול מדומה אחד: מסמך תיאור ונקודת בקרה של AVTransport.
 * כל פעולה נענית ב-200; הרמקול אף פעם לא מחזיר SOAP fault.
 *
 * אירועים:
 * - `action` (action: string) אחרי כל בקשת בקרה.
 * - `verified` (result: MediaVerification) כשבדיקת המדיה ברקע הסתיימה.
 */
export class ControlResponder extends EventEmitter {
  public readonly app: express.Express;
  private readonly verifyMode: MediaVerifyMode;
  private readonly verifyTimeoutMs: number;
  private readonly runCommand: CommandRunner;
  private readonly tempDir: string;
  private server: Server | null = null;

  constructor(
    public readonly speaker: EmulatedSpeaker,
    options: ControlResponderOptions = {},
  ) {
    super();
    this.verifyMode = options.verify ?? 'off';
    this.verifyTimeoutMs = options.verifyTimeoutMs ?? DEFAULT_VERIFY_TIMEOUT_MS;
    this.runCommand = options.runCommand ?? execFileRunner;
    this.tempDir = options.tempDir ?? os.tmpdir();
    this.app = this.createApp();
  }

  private createApp(): express.Express {
    const app = express();
    app.use(express.text({ type: () => true }));

    app.get(DEVICE_DESCRIPTION_PATH, (req: Request, res: Response) => {
      logger.info(`[${this.speaker.name}] Device description requested by ${req.ip}`);
      res.type(XML_CONTENT_TYPE).send(buildDeviceDescription(this.speaker.name));
    });

    app.post(AVTRANSPORT_CONTROL_PATH, async (req: Request, res: Response) => {
      const action = parseSoapActionName(req.get('SOAPAction') ?? '');
      const body: unknown = req.body;
      await this.speaker.runExclusive(() => this.handleAction(action, typeof body === 'string' ? body : ''));
      this.emit('action', action);
      res.status(200).type(XML_CONTENT_TYPE).send(buildActionResponse(action));
    });

    return app;
  }

  private handleAction(action: string, body: string): void {
    const name = this.speaker.name;
    switch (action) {
      case 'SetAVTransportURI': {
        this.speaker.lastMediaUri = extractTagValue(body, 'CurrentURI') ?? '';
        logger.info(`[${name}] SetAVTransportURI -> URI: ${this.speaker.lastMediaUri}`);
        break;
      }
      case 'Play': {
        const uri = this.speaker.lastMediaUri;
        logger.info(`[${name}] Play (URI: ${uri})`);
        if (this.verifyMode !== 'off' && uri) {
          const mode = this.verifyMode;
          this.verifyMedia(uri, mode)
            .then(result => this.emit('verified', result))
            .catch((err: unknown) => logger.error(`[${name}] Media verification crashed`, err));
        }
        break;
      }
      default:
        logger.info(`[${name}] Unknown SOAP action: ${action}`);
    }
  }

  private async verifyMedia(uri: string, mode: Exclude<MediaVerifyMode, 'off'>): Promise<MediaVerification> {
    const name = this.speaker.name;
    if (mode === 'play') {
      return this.playMedia(uri);
    }
    try {
      let status: number;
      let bytes: number | undefined;
      if (mode === 'head') {
        const response = await axios.head(uri, { timeout: this.verifyTimeoutMs, validateStatus: () => true });
        status = response.status;
      } else {
        // ב-Node, responseType 'arraybuffer' מחזיר Buffer
        const response = await axios.get<Buffer>(uri, {
          timeout: this.verifyTimeoutMs,
          responseType: 'arraybuffer',
          validateStatus: () => true,
        });
        status = response.status;
        bytes = response.data.length;
      }

      const ok = status >= 200 && status < 300;
      if (ok) {
        logger.info(`[${name}] VERIFIED - ${uri} (${status}${bytes !== undefined ? `, ${bytes} bytes` : ''})`);
      } else {
        logger.warn(`[${name}] VERIFY FAILED - ${uri} returned ${status}`);
      }
      return { speaker: name, uri, mode, ok, status, bytes };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`[${name}] VERIFY FAILED - ${uri}: ${message}`);
      return { speaker: name, uri, mode, ok: false, error: message };
    }
  }

  /**
   * @hebrew מוריד את המדיה לקובץ זמני, משמיע אותו עם afplay ומוחק את הקובץ.
   */
  private async playMedia(uri: string): Promise<MediaVerification> {
    const name = this.speaker.name;
    let tempPath: string | undefined;
    try {
      const response = await axios.get<Buffer>(uri, {
        timeout: this.verifyTimeoutMs,
        responseType: 'arraybuffer',
        validateStatus: () => true,
      });
      if (response.status < 200 || response.status >= 300) {
        logger.warn(`[${name}] PLAY FAILED - ${uri} returned ${response.status}`);
        return { speaker: name, uri, mode: 'play', ok: false, status: response.status };
      }

      const extension = path.extname(new URL(uri).pathname) || DEFAULT_MEDIA_EXTENSION;
      tempPath = path.join(this.tempDir, `emulator-${this.speaker.compactName}-${Date.now()}${extension}`);
      await fs.writeFile(tempPath, response.data);

      logger.info(`[${name}] PLAYING - ${uri} (${response.data.length} bytes)`);
      await this.runCommand(LOCAL_PLAYER_COMMAND, [tempPath]);
      logger.info(`[${name}] PLAY FINISHED - ${uri}`);
      return { speaker: name, uri, mode: 'play', ok: true, status: response.status, bytes: response.data.length };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`[${name}] PLAY FAILED - ${uri}: ${message}`);
      return { speaker: name, uri, mode: 'play', ok: false, error: message };
    } finally {
      if (tempPath) {
        await fs.rm(tempPath, { force: true });
      }
    }
  }

  /**
   * @hebrew מאזין על הפורט של הרמקול. פורט 0 מוחלף בפורט שנבחר בפועל.
   * @throws כשל בקשירה (למשל EADDRINUSE).
   */
  public start(host: string): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      const server = this.app.listen(this.speaker.port, host, (error?: Error) => {
        if (error) {
          reject(error);
          return;
        }
        const address = server.address();
        if (address !== null && typeof address !== 'string') {
          this.speaker.port = address.port;
        }
        this.server = server;
        logger.info(`[${this.speaker.name}] HTTP server listening on ${host}:${this.speaker.port}`);
        resolve(this.speaker.port);
      });
    });
  }

  public stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();
    return new Promise<void>((resolve, reject) => {
      server.closeAllConnections();
      server.close(err => (err ? reject(err) : resolve()));
    });
  }
}
