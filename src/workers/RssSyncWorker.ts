import {
  RSS_SYNC_ERROR_COOLDOWN_MS,
  clampSyncInterval,
  loadEngineConfig
} from '../config/engineConfig';
import logger from '../config/logger';
import type { CascadeCoordinator } from '../services/cascadeSearch';
import { RssSyncResult, RssSyncService, waitFor } from '../services/rssSync';
import { errorMessage } from '../utils/errors';

const WORKER_NAME = '[RSS Sync]';

export interface RssSyncWorkerOptions {
  warmupMs: number;
  cooldownMs?: number;
}

export interface RssSyncStatus {
  running: boolean;
  syncing: boolean;
  lastSyncAt: string | null;
  nextSyncAt: string | null;
  intervalMinutes: number;
  lastResult: RssSyncResult | null;
  lastError: string | null;
}

type CycleRunner = Pick<RssSyncService, 'runCycle'>;

/**
 * Drives the RSS sync: warm-up, then one cycle per configured interval.
 * Cycles never overlap; a failed cycle is followed by a cooldown.
 */
export class RssSyncWorker {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private isSyncing: boolean = false;
  private lastSyncAt: Date | null = null;
  private nextSyncAt: Date | null = null;
  private intervalMinutes: number = 0;
  private lastResult: RssSyncResult | null = null;
  private lastError: string | null = null;

  constructor(
    private readonly service: CycleRunner,
    private readonly cascade: CascadeCoordinator | null,
    private readonly options: RssSyncWorkerOptions
  ) {}

  start(): void {
    if (this.controller) {
      logger.info(`${WORKER_NAME} Already running`);
      return;
    }

    this.controller = new AbortController();
    const signal = this.controller.signal;
    this.nextSyncAt = new Date(Date.now() + this.options.warmupMs);
    logger.info(`${WORKER_NAME} Starting, first sync in ${Math.round(this.options.warmupMs / 1000)}s`);

    this.loop = this.run(signal).catch(error => {
      logger.error(`${WORKER_NAME} Scheduler loop crashed: ${errorMessage(error)}`, error);
    });
  }

  async stop(): Promise<void> {
    if (!this.controller) {
      return;
    }

    this.controller.abort();
    await this.loop;
    this.controller = null;
    this.loop = null;
    this.nextSyncAt = null;

    if (this.cascade) {
      await this.cascade.shutdown();
    }
    logger.info(`${WORKER_NAME} Stopped`);
  }

  /**
   * Runs a cycle now. Returns null when one is already in progress.
   */
  async triggerNow(): Promise<RssSyncResult | null> {
    if (this.isSyncing) {
      return null;
    }
    return this.runCycle(this.controller?.signal);
  }

  getStatus(): RssSyncStatus {
    return {
      running: this.controller !== null,
      syncing: this.isSyncing,
      lastSyncAt: this.lastSyncAt?.toISOString() ?? null,
      nextSyncAt: this.nextSyncAt?.toISOString() ?? null,
      intervalMinutes: this.intervalMinutes,
      lastResult: this.lastResult,
      lastError: this.lastError
    };
  }

  private async run(signal: AbortSignal): Promise<void> {
    if (!await waitFor(this.options.warmupMs, signal)) {
      return;
    }

    while (!signal.aborted) {
      let delayMs: number;
      try {
        this.intervalMinutes = clampSyncInterval(loadEngineConfig().rssSyncIntervalMinutes);
        if (!this.isSyncing) {
          await this.runCycle(signal);
        }
        delayMs = this.intervalMinutes * 60 * 1000;
      } catch (error) {
        this.lastError = errorMessage(error);
        delayMs = this.options.cooldownMs ?? RSS_SYNC_ERROR_COOLDOWN_MS;
        logger.error(`${WORKER_NAME} Cycle failed, retrying in ${Math.round(delayMs / 1000)}s: ${this.lastError}`, error);
      }

      this.nextSyncAt = new Date(Date.now() + delayMs);
      if (!await waitFor(delayMs, signal)) {
        break;
      }
    }
  }

  private async runCycle(signal?: AbortSignal): Promise<RssSyncResult> {
    this.isSyncing = true;
    try {
      const result = await this.service.runCycle(signal);
      this.lastResult = result;
      this.lastSyncAt = new Date();
      this.lastError = null;
      return result;
    } finally {
      this.isSyncing = false;
    }
  }
}
