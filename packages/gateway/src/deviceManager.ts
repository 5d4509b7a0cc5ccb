import {
  createModuleLogger,
  DiscoveryClient,
  DeviceRegistry,
  type DeviceRecord,
  type DiscoveryClientOptions,
} from '@lan-announcer/core';

const logger = createModuleLogger('DeviceManager');

export interface DeviceManagerOptions {
  discovery?: DiscoveryClientOptions;
  /** 0 = ללא גילוי תקופתי */
  refreshIntervalMs?: number;
}

/**
 * @hebrew מחזיק את הרישום של השער ומריץ עליו מעברי גילוי, בהפעלה ולפי דרישה.
 */
export class DeviceManager {
  public readonly registry: DeviceRegistry;
  private readonly discoveryClient: DiscoveryClient;
  private readonly refreshIntervalMs: number;
  private refreshIntervalId: NodeJS.Timeout | null = null;
  private passInProgress: Promise<DeviceRecord[]> | null = null;

  constructor(options: DeviceManagerOptions = {}, registry: DeviceRegistry = new DeviceRegistry()) {
    this.registry = registry;
    this.discoveryClient = new DiscoveryClient(options.discovery);
    this.refreshIntervalMs = options.refreshIntervalMs ?? 0;

    this.discoveryClient.on('devicefound', (device: DeviceRecord) => {
      logger.debug(`Device found: ${device.displayName} (id: ${device.stableId}, base: ${device.controlBaseUrl})`);
    });
  }

  /**
   * @hebrew מריץ מעבר גילוי ומחליף את הרישום בתוצאה.
   * קריאה בזמן שמעבר כבר רץ מצטרפת אליו במקום לפתוח מעבר נוסף.
   */
  public runDiscoveryPass(): Promise<DeviceRecord[]> {
    if (!this.passInProgress) {
      this.passInProgress = this._runPass().finally(() => {
        this.passInProgress = null;
      });
    }
    return this.passInProgress;
  }

  private async _runPass(): Promise<DeviceRecord[]> {
    logger.info('Starting discovery pass...');
    const devices = await this.discoveryClient.discover();
    this.registry.replace(devices.values());
    this.logSpeakers();
    return this.registry.list();
  }

  private logSpeakers(): void {
    const speakers = this.registry.list();
    if (speakers.length === 0) {
      logger.info('Discovered speakers: (none found)');
      return;
    }
    logger.info(`Discovered speakers:\n${speakers.map(s => `- ${s.displayName} (id: ${s.stableId})`).join('\n')}`);
  }

  /**
   * @hebrew מפעיל גילוי תקופתי אם הוגדר מרווח. כל מעבר מבודד: כשל נרשם ולא עוצר את הטיימר.
   */
  public startPeriodicRefresh(): void {
    if (this.refreshIntervalMs <= 0 || this.refreshIntervalId) {
      return;
    }
    logger.info(`Periodic rediscovery every ${this.refreshIntervalMs}ms`);
    this.refreshIntervalId = setInterval(() => {
      this.runDiscoveryPass().catch((error: unknown) => {
        logger.error('Periodic discovery pass failed:', error);
      });
    }, this.refreshIntervalMs);
  }

  public stop(): void {
    if (this.refreshIntervalId) {
      clearInterval(this.refreshIntervalId);
      this.refreshIntervalId = null;
      logger.info('Periodic rediscovery stopped.');
    }
  }
}
