import {
  createModuleLogger,
  getProcessedEnv,
  initializeConfig,
  loadEnvFiles,
  type ProcessedEnv,
} from '@lan-announcer/core';
import { isMediaVerifyMode, type MediaVerifyMode } from './controlResponder';

const logger = createModuleLogger('EmulatorConfig');

const defaultConfig = {
  emulator: {
    speakers: 'Living Room,Kitchen',
    basePort: 1400,
    // off | head | fetch | play
    verify: 'off',
    // ריק = כתובת ה-IPv4 המקומית
    advertiseHost: '',
    bindHost: '0.0.0.0',
  },
};

export interface EmulatorConfig {
  speakers: string;
  basePort: number;
  verify: MediaVerifyMode;
  advertiseHost: string;
  bindHost: string;
}

/**
 * @hebrew תצורת האמולטור. EMULATOR_SPEAKERS, EMULATOR_BASE_PORT, EMULATOR_VERIFY וכו'.
 */
export function loadEmulatorConfig(env?: ProcessedEnv): EmulatorConfig {
  let effectiveEnv = env;
  if (!effectiveEnv) {
    loadEnvFiles();
    effectiveEnv = getProcessedEnv();
  }

  const { emulator } = initializeConfig(defaultConfig, effectiveEnv);

  let verify: MediaVerifyMode = 'off';
  if (isMediaVerifyMode(emulator.verify)) {
    verify = emulator.verify;
  } else {
    logger.warn(`Unknown EMULATOR_VERIFY value "${emulator.verify}", using "off"`);
  }

  return { ...emulator, verify };
}
