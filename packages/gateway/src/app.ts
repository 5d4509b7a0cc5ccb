import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import type { Server } from 'node:http';

import { createModuleLogger } from '@lan-announcer/core';
import { createApiRouter, type ApiDependencies } from './routes';
import { AnnouncementFanOutError, statusCodeFor } from './errors';

const logger = createModuleLogger('AppServer');

export interface AppOptions {
  corsOrigin?: string;
}

/**
 * @hebrew קוד סטטוס שמגיע משגיאות של express עצמו (למשל JSON לא תקין מ-body-parser).
 */
function clientStatusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  const status: unknown = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
}

export function createApp(dependencies: ApiDependencies, options: AppOptions = {}): express.Express {
  const app = express();

  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  // curl -d שולח form content-type; הגוף מפוענח כ-JSON בכל מקרה
  app.use(express.json({ type: () => true }));

  app.use(createApiRouter(dependencies));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `Cannot ${req.method} ${req.path}` });
  });

  // Error handling middleware - חייב להיות האחרון
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const statusCode = clientStatusOf(err) ?? statusCodeFor(err);
    const message = err instanceof Error ? err.message : String(err);

    if (statusCode >= 500) {
      logger.error(`${req.method} ${req.path} failed with ${statusCode}:`, err);
    } else {
      logger.warn(`${req.method} ${req.path} rejected with ${statusCode}: ${message}`);
    }

    if (err instanceof AnnouncementFanOutError) {
      res.status(statusCode).json({ error: message, attempts: err.attempts });
      return;
    }
    if (process.env.NODE_ENV === 'production' && statusCode === 500) {
      res.status(500).json({ error: 'Internal Server Error' });
      return;
    }
    res.status(statusCode).json({ error: message });
  });

  return app;
}

export function startServer(app: express.Express, host: string, port: number): Promise<Server> {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port, host, (error?: Error) => {
      if (error) {
        reject(error);
        return;
      }
      logger.info(`API server listening on http://${host}:${port}`);
      resolve(server);
    });
  });
}
