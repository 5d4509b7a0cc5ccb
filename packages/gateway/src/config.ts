import {
  getProcessedEnv,
  initializeConfig,
  loadEnvFiles,
  type ProcessedEnv,
} from '@lan-announcer/core';

/**
 * אובייקט התצורה של השער.
 * כל עלה ניתן לדריסה במשתנה סביבה לפי הנתיב שלו, למשל media.port -> MEDIA_PORT.
 */
const defaultConfig = {
  server: {
    host: '0.0.0.0',
    port: 9000,
  },
  media: {
    port: 8080,
    root: './tts',
  },
  network: {
    // ריק = זיהוי אוטומטי של כתובת ה-IPv4 המקומית
    localIp: '',
  },
  discovery: {
    timeoutMs: 5000,
    fetchTimeoutMs: 3000,
    // 0 = מעבר גילוי אחד בהפעלה בלבד
    refreshIntervalMs: 0,
  },
  control: {
    settleDelayMs: 300,
    requestTimeoutMs: 10000,
  },
  chat: {
    // ריק = כל השולחים מורשים
    allowedSenderId: '',
    botUsername: '',
  },
  cors: {
    origin: '*',
  },
  tts: {
    voice: '',
  },
};

export type GatewayConfig = typeof defaultConfig;

/**
 * @hebrew בונה את תצורת השער מברירות המחדל וממשתני הסביבה.
 * LOCAL_IP נתמך ככינוי ל-NETWORK_LOCAL_IP.
 * @param env - ברירת המחדל: קבצי ה-.env ו-process.env.
 */
export function loadGatewayConfig(env?: ProcessedEnv): GatewayConfig {
  let effectiveEnv = env;
  if (!effectiveEnv) {
    loadEnvFiles();
    effectiveEnv = getProcessedEnv();
  }

  const config = initializeConfig(defaultConfig, effectiveEnv);

  const localIpAlias = effectiveEnv.LOCAL_IP;
  if (!config.network.localIp && typeof localIpAlias === 'string' && localIpAlias.trim() !== '') {
    config.network.localIp = localIpAlias.trim();
  }

  return config;
}
