import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  DEFAULT_ENGINE_CONFIG,
  RSS_SYNC_DEFAULT_WARMUP_MS,
  clampSyncInterval,
  effectiveAgeLimitDays,
  isSettingKey,
  loadEngineConfig,
  validateSetting,
  warmupMsFromEnv
} from '../../src/config/engineConfig';
import { SystemSettingsModel } from '../../src/models/SystemSettings';
import { resetDatabase } from '../helpers';

describe('engineConfig', () => {
  beforeEach(() => {
    resetDatabase();
  });

  describe('loadEngineConfig', () => {
    it('uses defaults when nothing is stored', () => {
      expect(loadEngineConfig()).toEqual(DEFAULT_ENGINE_CONFIG);
    });

    it('reads stored settings', () => {
      SystemSettingsModel.set('rss_sync_interval', 30);
      SystemSettingsModel.set('enable_multi_part_episodes', false);
      SystemSettingsModel.set('retry_backoff_minutes', '5, 10');
      SystemSettingsModel.set('rss_release_age_limit', 0);

      const config = loadEngineConfig();

      expect(config.rssSyncIntervalMinutes).toBe(30);
      expect(config.enableMultiPartEpisodes).toBe(false);
      expect(config.retryBackoffMinutes).toEqual([5, 10]);
      expect(config.rssReleaseAgeLimitDays).toBe(0);
    });

    it('accepts 1 and 0 as flags', () => {
      SystemSettingsModel.set('enable_multi_part_episodes', '0');
      expect(loadEngineConfig().enableMultiPartEpisodes).toBe(false);
      SystemSettingsModel.set('enable_multi_part_episodes', '1');
      expect(loadEngineConfig().enableMultiPartEpisodes).toBe(true);
    });

    it('falls back per setting when a stored value is malformed', () => {
      SystemSettingsModel.set('rss_sync_interval', 'abc');
      SystemSettingsModel.set('retry_backoff_minutes', '0,5');
      SystemSettingsModel.set('grab_delay_ms', 250);

      const config = loadEngineConfig();

      expect(config.rssSyncIntervalMinutes).toBe(15);
      expect(config.retryBackoffMinutes).toEqual([30, 60, 120, 240, 480]);
      expect(config.grabDelayMs).toBe(250);
    });
  });

  it('validates setting values', () => {
    expect(validateSetting('rss_sync_interval', '-5')).not.toBeNull();
    expect(validateSetting('enable_multi_part_episodes', 'maybe')).not.toBeNull();
    expect(validateSetting('retry_backoff_minutes', '30,60')).toBeNull();
    expect(isSettingKey('grab_delay_ms')).toBe(true);
    expect(isSettingKey('nope')).toBe(false);
  });

  it('clamps the sync interval', () => {
    expect(clampSyncInterval(5)).toBe(10);
    expect(clampSyncInterval(500)).toBe(120);
    expect(clampSyncInterval(30)).toBe(30);
  });

  it('uses the tighter of the age limit and retention', () => {
    expect(effectiveAgeLimitDays({ ...DEFAULT_ENGINE_CONFIG, rssReleaseAgeLimitDays: 14, indexerRetentionDays: 0 })).toBe(14);
    expect(effectiveAgeLimitDays({ ...DEFAULT_ENGINE_CONFIG, rssReleaseAgeLimitDays: 14, indexerRetentionDays: 7 })).toBe(7);
    expect(effectiveAgeLimitDays({ ...DEFAULT_ENGINE_CONFIG, rssReleaseAgeLimitDays: 0, indexerRetentionDays: 0 })).toBe(0);
  });

  describe('warmupMsFromEnv', () => {
    const savedWarmup = process.env.RSS_SYNC_WARMUP_SECONDS;

    afterEach(() => {
      if (savedWarmup === undefined) {
        delete process.env.RSS_SYNC_WARMUP_SECONDS;
      } else {
        process.env.RSS_SYNC_WARMUP_SECONDS = savedWarmup;
      }
    });

    it('reads seconds from the environment', () => {
      process.env.RSS_SYNC_WARMUP_SECONDS = '0';
      expect(warmupMsFromEnv()).toBe(0);
      process.env.RSS_SYNC_WARMUP_SECONDS = '30';
      expect(warmupMsFromEnv()).toBe(30_000);
    });

    it('falls back to the default warm-up', () => {
      delete process.env.RSS_SYNC_WARMUP_SECONDS;
      expect(warmupMsFromEnv()).toBe(RSS_SYNC_DEFAULT_WARMUP_MS);
      process.env.RSS_SYNC_WARMUP_SECONDS = 'soon';
      expect(warmupMsFromEnv()).toBe(RSS_SYNC_DEFAULT_WARMUP_MS);
    });
  });
});
