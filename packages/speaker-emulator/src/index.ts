// Import necessary for side effects: loads .env before any module logger is created.
import '@lan-announcer/core/env';

import { createModuleLogger, findLocalIPv4Address } from '@lan-announcer/core';

import { loadEmulatorConfig } from './config';
import { createSpeakers } from './emulatedSpeaker';
import { ControlResponder } from './controlResponder';
import { DiscoveryResponder } from './discoveryResponder';

const logger = createModuleLogger('EmulatorIndex');

async function main(): Promise<void> {
  const config = loadEmulatorConfig();

  const speakers = createSpeakers(config.speakers, config.basePort);
  if (speakers.length === 0) {
    throw new Error('No speakers configured');
  }

  const advertiseHost = config.advertiseHost || findLocalIPv4Address();
  logger.info(`Local IP: ${advertiseHost}`);

  const controlResponders = speakers.map(speaker => new ControlResponder(speaker, { verify: config.verify }));
  for (const responder of controlResponders) {
    await responder.start(config.bindHost);
  }
  logger.info(`Virtual speakers:\n${speakers.map(s => `  - ${s.name} on port ${s.port}`).join('\n')}`);

  const discoveryResponder = new DiscoveryResponder(speakers, { advertiseHost });
  discoveryResponder.on('fatal', (err: Error) => {
    logger.error('SSDP responder stopped:', err);
    process.exit(1);
  });
  await discoveryResponder.start();

  logger.info('Speaker emulator ready');

  const shutdown = (signal: string) => {
    logger.info(`${signal} received. Shutting down`);
    Promise.all([discoveryResponder.stop(), ...controlResponders.map(r => r.stop())])
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Error during shutdown:', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((error: unknown) => {
  logger.error('Emulator failed to start:', error);
  process.exit(1);
});
