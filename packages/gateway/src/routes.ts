import { Router, type Request, type Response } from 'express';

import { createModuleLogger } from '@lan-announcer/core';
import type { Announcer } from './announcer';
import type { DeviceManager } from './deviceManager';
import type { MessageDispatcher } from './messageDispatcher';
import { InvalidAnnouncementError } from './errors';

const logger = createModuleLogger('ApiRoutes');

export interface ApiDependencies {
  announcer: Announcer;
  deviceManager: DeviceManager;
  dispatcher: MessageDispatcher;
}

/**
 * @hebrew קורא שדה מגוף בקשת JSON.
 * @returns undefined כשהשדה חסר; זורק InvalidAnnouncementError כשהוא לא מחרוזת.
 */
function readStringField(body: unknown, field: string): string | undefined {
  if (typeof body !== 'object' || body === null) {
    return undefined;
  }
  const value: unknown = Reflect.get(body, field);
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    return String(value);
  }
  throw new InvalidAnnouncementError(`"${field}" must be a string`);
}

export function createApiRouter({ announcer, deviceManager, dispatcher }: ApiDependencies): Router {
  const router = Router();

  router.get('/speakers', (_req: Request, res: Response) => {
    res.json({ speakers: announcer.listDevices() });
  });

  router.post('/speakers/refresh', async (_req: Request, res: Response) => {
    await deviceManager.runDiscoveryPass();
    res.json({ speakers: announcer.listDevices() });
  });

  router.post('/speak', async (req: Request, res: Response) => {
    const text = readStringField(req.body, 'text');
    if (!text || !text.trim()) {
      throw new InvalidAnnouncementError('"text" is required');
    }
    const target = readStringField(req.body, 'target') ?? '';

    const result = await announcer.announce(text, target);
    res.json({ status: 'ok', target: result.target, attempts: result.attempts });
  });

  // webhook לחזית צ'אט: מחזיר את התשובה שהבוט צריך לשלוח
  router.post('/messages', async (req: Request, res: Response) => {
    const text = readStringField(req.body, 'text') ?? '';
    const senderId = readStringField(req.body, 'senderId');
    const reply = await dispatcher.onUserMessage(text, senderId);
    logger.debug(`/messages from ${senderId ?? 'anonymous'} -> ${reply === null ? '(no reply)' : 'reply'}`);
    res.json({ reply });
  });

  return router;
}
