// Import necessary for side effects: loads .env before any module logger is created.
import '@lan-announcer/core/env';

import type { Server } from 'node:http';

import {
  ControlClient,
  createModuleLogger,
  findLocalIPv4Address,
} from '@lan-announcer/core';

import { loadGatewayConfig } from './config';
import { Announcer } from './announcer';
import { SpeechCommandAudioProducer } from './audioProducer';
import { DeviceManager } from './deviceManager';
import { MessageDispatcher } from './messageDispatcher';
import { serveDirectory } from './mediaServer';
import { createApp, startServer } from './app';

const logger = createModuleLogger('MainIndex');

const SHUTDOWN_TIMEOUT_MS = 5000;

async function main(): Promise<void> {
  const config = loadGatewayConfig();
  logger.info('Application starting...');

  const localIp = config.network.localIp || findLocalIPv4Address();
  logger.info(`Local IP: ${localIp}`);

  const deviceManager = new DeviceManager({
    discovery: {
      timeoutMs: config.discovery.timeoutMs,
      fetchTimeoutMs: config.discovery.fetchTimeoutMs,
    },
    refreshIntervalMs: config.discovery.refreshIntervalMs,
  });

  const announcer = new Announcer({
    registry: deviceManager.registry,
    playbackClient: new ControlClient({
      settleDelayMs: config.control.settleDelayMs,
      requestTimeoutMs: config.control.requestTimeoutMs,
    }),
    audioProducer: new SpeechCommandAudioProducer({
      outputDir: config.media.root,
      voice: config.tts.voice || undefined,
    }),
    mediaBaseUrl: `http://${localIp}:${config.media.port}`,
    mediaRoot: config.media.root,
  });

  const dispatcher = new MessageDispatcher(announcer, {
    allowedSenderId: config.chat.allowedSenderId,
    botUsername: config.chat.botUsername,
  });

  const mediaServer = await serveDirectory(config.media.root, localIp, config.media.port);

  await deviceManager.runDiscoveryPass();

  const app = createApp({ announcer, deviceManager, dispatcher }, { corsOrigin: config.cors.origin });
  const apiServer = await startServer(app, config.server.host, config.server.port);

  deviceManager.startPeriodicRefresh();
  logger.info('Announcement gateway ready');

  installShutdownHandlers(deviceManager, [apiServer, mediaServer]);
}

function closeServer(server: Server): Promise<void> {
  return new Promise<void>((resolve) => {
    server.closeAllConnections();
    server.close((err) => {
      if (err) {
        logger.warn('Error while closing server', err);
      }
      resolve();
    });
  });
}

function installShutdownHandlers(deviceManager: DeviceManager, servers: Server[]): void {
  let shuttingDown = false;

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`${signal} received. Attempting graceful shutdown...`);
    deviceManager.stop();

    const forceExit = setTimeout(() => {
      logger.warn('Server close timed out. Forcing exit.');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    Promise.all(servers.map(closeServer))
      .then(() => {
        logger.info('Servers closed. Exiting.');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error('Error during shutdown:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

process.on('uncaughtException', (error) => {
  logger.error('CRITICAL: Uncaught Exception:', error);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('CRITICAL: Unhandled Rejection, reason:', reason);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error('Error during application startup:', error);
  process.exit(1);
});
