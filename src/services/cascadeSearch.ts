import { setTimeout as sleep } from 'timers/promises';
import logger from '../config/logger';
import { errorMessage } from '../utils/errors';

// resolution is null when the upgraded release carried none
export type PartSearcher = (eventId: string, part: string, resolution: string | null) => Promise<unknown>;

export function cascadeKey(eventId: string, part: string, resolution: string | null): string {
  return `${eventId}_${part}_${resolution ?? 'unknown'}`;
}

/**
 * Runs re-searches for sibling parts after one part is upgraded. At most one
 * search per (event, part, resolution) is in flight; duplicates are dropped.
 */
export class CascadeCoordinator {
  private readonly inFlight = new Set<string>();
  private readonly tasks = new Set<Promise<void>>();
  private controller = new AbortController();

  constructor(private readonly searcher: PartSearcher) {}

  tryAcquire(key: string): boolean {
    if (this.inFlight.has(key)) {
      return false;
    }
    this.inFlight.add(key);
    return true;
  }

  release(key: string): void {
    this.inFlight.delete(key);
  }

  isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }

  get pendingCount(): number {
    return this.tasks.size;
  }

  /**
   * Starts a background task searching the given parts one after another.
   * Returns null when every part already has a cascade running.
   */
  schedule(eventId: string, parts: string[], resolution: string | null, delayMs: number): Promise<void> | null {
    if (this.controller.signal.aborted) {
      logger.debug('[Cascading Upgrade] Coordinator stopped, ignoring request');
      return null;
    }

    const acquired = parts.filter(part => this.tryAcquire(cascadeKey(eventId, part, resolution)));
    const skipped = parts.filter(part => !acquired.includes(part));
    for (const part of skipped) {
      logger.debug(`[Cascading Upgrade] ${part} @ ${resolution ?? 'any resolution'} already being searched for event ${eventId}`);
    }
    if (acquired.length === 0) {
      return null;
    }

    logger.info(`[Cascading Upgrade] Re-searching ${acquired.join(', ')} at ${resolution ?? 'any resolution'} for event ${eventId}`);
    const task: Promise<void> = this.run(eventId, acquired, resolution, delayMs, this.controller.signal).finally(() => {
      this.tasks.delete(task);
    });
    this.tasks.add(task);
    return task;
  }

  private async run(eventId: string, parts: string[], resolution: string | null, delayMs: number, signal: AbortSignal): Promise<void> {
    try {
      for (const [index, part] of parts.entries()) {
        if (signal.aborted) break;
        const key = cascadeKey(eventId, part, resolution);
        try {
          if (index > 0 && delayMs > 0) {
            await sleep(delayMs, undefined, { signal });
          }
          await this.searcher(eventId, part, resolution);
        } catch (error) {
          if (signal.aborted) break;
          logger.error(`[Cascading Upgrade] Search for ${part} of event ${eventId} failed: ${errorMessage(error)}`);
        } finally {
          this.release(key);
        }
      }
    } finally {
      for (const part of parts) {
        this.release(cascadeKey(eventId, part, resolution));
      }
    }
  }

  /**
   * Waits for every running cascade to settle.
   */
  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
  }

  /**
   * Cancels pending cascade steps and waits for running ones to finish.
   * The coordinator accepts new work again afterwards.
   */
  async shutdown(): Promise<void> {
    this.controller.abort();
    await this.drain();
    this.controller = new AbortController();
  }
}
