import express from 'express';
import fs from 'node:fs/promises';
import type { Server } from 'node:http';

import { createModuleLogger } from '@lan-announcer/core';

const logger = createModuleLogger('MediaServer');

/**
 * @hebrew אפליקציה שמגישה את קבצי השמע מתיקיית המדיה.
 */
export function createMediaApp(root: string): express.Express {
  const app = express();
  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.originalUrl} from ${req.ip}`);
    next();
  });
  app.use(express.static(root, { index: false, fallthrough: true }));
  return app;
}

/**
 * @hebrew יוצר את תיקיית המדיה ומפעיל את שרת הקבצים.
 * @throws כשל בקשירה (למשל EADDRINUSE) דוחה את ה-Promise.
 */
export async function serveDirectory(root: string, host: string, port: number): Promise<Server> {
  await fs.mkdir(root, { recursive: true });
  const app = createMediaApp(root);

  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      logger.info(`Media file server on http://${host}:${port}/ serving ${root}`);
      resolve(server);
    });
  });
}
