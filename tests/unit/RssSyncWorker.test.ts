import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SystemSettingsModel } from '../../src/models/SystemSettings';
import { CascadeCoordinator } from '../../src/services/cascadeSearch';
import type { RssSyncResult } from '../../src/services/rssSync';
import { RssSyncWorker } from '../../src/workers/RssSyncWorker';
import { resetDatabase } from '../helpers';

const result: RssSyncResult = { indexersChecked: 2, releasesFetched: 10, releasesConsidered: 8, matched: 3, grabbed: 1, upgraded: 0, errors: 0 };

describe('RssSyncWorker', () => {
  let worker: RssSyncWorker | null = null;

  beforeEach(() => {
    resetDatabase();
  });

  afterEach(async () => {
    await worker?.stop();
    worker = null;
  });

  it('runs a cycle after the warm-up and reports status', async () => {
    const runCycle = vi.fn((_signal?: AbortSignal) => Promise.resolve(result));
    const current = new RssSyncWorker({ runCycle }, null, { warmupMs: 0 });
    worker = current;

    current.start();
    await vi.waitFor(() => expect(current.getStatus().lastResult).toEqual(result));

    const status = current.getStatus();
    expect(runCycle).toHaveBeenCalledTimes(1);
    expect(status.running).toBe(true);
    expect(status.syncing).toBe(false);
    expect(status.intervalMinutes).toBe(15);
    expect(status.lastSyncAt).not.toBeNull();
    expect(status.lastError).toBeNull();
  });

  it('clamps the configured interval', async () => {
    SystemSettingsModel.set('rss_sync_interval', 5);
    const runCycle = vi.fn((_signal?: AbortSignal) => Promise.resolve(result));
    const current = new RssSyncWorker({ runCycle }, null, { warmupMs: 0 });
    worker = current;

    current.start();
    await vi.waitFor(() => expect(current.getStatus().intervalMinutes).toBe(10));

    expect(runCycle).toHaveBeenCalledTimes(1);
  });

  it('retries after the cooldown when a cycle fails', async () => {
    const runCycle = vi.fn((_signal?: AbortSignal) => Promise.resolve(result))
      .mockRejectedValueOnce(new Error('database locked'));
    const current = new RssSyncWorker({ runCycle }, null, { warmupMs: 0, cooldownMs: 10 });
    worker = current;

    current.start();
    await vi.waitFor(() => expect(current.getStatus().lastResult).toEqual(result));

    expect(runCycle).toHaveBeenCalledTimes(2);
    expect(current.getStatus().lastError).toBeNull();
  });

  it('refuses a manual trigger while a cycle is running', async () => {
    let finish: (value: RssSyncResult) => void = () => undefined;
    const runCycle = vi.fn((_signal?: AbortSignal) => new Promise<RssSyncResult>(resolve => {
      finish = resolve;
    }));
    const idle = new RssSyncWorker({ runCycle }, null, { warmupMs: 0 });

    const first = idle.triggerNow();
    expect(await idle.triggerNow()).toBeNull();
    expect(idle.getStatus().syncing).toBe(true);

    finish(result);
    expect(await first).toEqual(result);
    expect(idle.getStatus().syncing).toBe(false);
  });

  it('stops the loop and shuts down cascades', async () => {
    const cascade = new CascadeCoordinator(() => Promise.resolve());
    const shutdown = vi.spyOn(cascade, 'shutdown');
    const runCycle = vi.fn((_signal?: AbortSignal) => Promise.resolve(result));
    const stoppable = new RssSyncWorker({ runCycle }, cascade, { warmupMs: 60_000 });

    stoppable.start();
    expect(stoppable.getStatus().nextSyncAt).not.toBeNull();
    await stoppable.stop();

    expect(runCycle).not.toHaveBeenCalled();
    expect(shutdown).toHaveBeenCalledTimes(1);
    expect(stoppable.getStatus()).toMatchObject({ running: false, nextSyncAt: null });
  });
});
