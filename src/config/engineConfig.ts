import { z } from 'zod';
import logger from './logger';
import { SystemSettingsModel } from '../models/SystemSettings';

export interface EngineConfig {
  rssSyncIntervalMinutes: number;
  maxRssReleasesPerIndexer: number;
  rssReleaseAgeLimitDays: number;
  indexerRetentionDays: number;
  enableMultiPartEpisodes: boolean;
  searchCacheDurationSeconds: number;
  retryBackoffMinutes: number[];
  grabDelayMs: number;
  cascadeSearchDelayMs: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  rssSyncIntervalMinutes: 15,
  maxRssReleasesPerIndexer: 100,
  rssReleaseAgeLimitDays: 14,
  indexerRetentionDays: 0,
  enableMultiPartEpisodes: true,
  searchCacheDurationSeconds: 60,
  retryBackoffMinutes: [30, 60, 120, 240, 480],
  grabDelayMs: 1000,
  cascadeSearchDelayMs: 2000
};

export const RSS_SYNC_MIN_INTERVAL_MINUTES = 10;
export const RSS_SYNC_MAX_INTERVAL_MINUTES = 120;
export const RSS_SYNC_ERROR_COOLDOWN_MS = 5 * 60 * 1000;
export const RSS_SYNC_DEFAULT_WARMUP_MS = 2 * 60 * 1000;

const wholeNumber = z.coerce.number().int().nonnegative();

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['true', 'false', '1', '0']))
  .transform(value => value === 'true' || value === '1');

const minuteLadder = z
  .string()
  .transform(value => value.split(',').map(part => part.trim()).filter(part => part.length > 0).map(Number))
  .pipe(z.array(z.number().int().positive()).min(1));

const SETTING_SCHEMAS = {
  rss_sync_interval: z.coerce.number().int().positive(),
  max_rss_releases_per_indexer: z.coerce.number().int().positive(),
  rss_release_age_limit: wholeNumber,
  indexer_retention: wholeNumber,
  enable_multi_part_episodes: flag,
  search_cache_duration: wholeNumber,
  retry_backoff_minutes: minuteLadder,
  grab_delay_ms: wholeNumber,
  cascade_search_delay_ms: wholeNumber
};

export type SettingKey = keyof typeof SETTING_SCHEMAS;

export function isSettingKey(key: string): key is SettingKey {
  return Object.prototype.hasOwnProperty.call(SETTING_SCHEMAS, key);
}

/**
 * Checks a raw value against its setting's schema; returns the issue message
 * when invalid.
 */
export function validateSetting(key: SettingKey, value: string): string | null {
  const parsed = SETTING_SCHEMAS[key].safeParse(value);
  return parsed.success ? null : parsed.error.issues[0]?.message ?? 'Invalid value';
}

function readSetting<S extends z.ZodTypeAny>(
  raw: Record<string, string>,
  key: SettingKey,
  schema: S,
  fallback: z.output<S>
): z.output<S> {
  const value = raw[key];
  if (value === undefined) {
    return fallback;
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    logger.warn(`[Config] Invalid value "${value}" for ${key}, using default: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    return fallback;
  }
  return parsed.data;
}

/**
 * Reads engine settings from system_settings. Every value is optional and
 * falls back to its default when missing or malformed.
 */
export function loadEngineConfig(): EngineConfig {
  const raw = SystemSettingsModel.getAll();
  const d = DEFAULT_ENGINE_CONFIG;
  const s = SETTING_SCHEMAS;

  return {
    rssSyncIntervalMinutes: readSetting(raw, 'rss_sync_interval', s.rss_sync_interval, d.rssSyncIntervalMinutes),
    maxRssReleasesPerIndexer: readSetting(raw, 'max_rss_releases_per_indexer', s.max_rss_releases_per_indexer, d.maxRssReleasesPerIndexer),
    rssReleaseAgeLimitDays: readSetting(raw, 'rss_release_age_limit', s.rss_release_age_limit, d.rssReleaseAgeLimitDays),
    indexerRetentionDays: readSetting(raw, 'indexer_retention', s.indexer_retention, d.indexerRetentionDays),
    enableMultiPartEpisodes: readSetting(raw, 'enable_multi_part_episodes', s.enable_multi_part_episodes, d.enableMultiPartEpisodes),
    searchCacheDurationSeconds: readSetting(raw, 'search_cache_duration', s.search_cache_duration, d.searchCacheDurationSeconds),
    retryBackoffMinutes: readSetting(raw, 'retry_backoff_minutes', s.retry_backoff_minutes, d.retryBackoffMinutes),
    grabDelayMs: readSetting(raw, 'grab_delay_ms', s.grab_delay_ms, d.grabDelayMs),
    cascadeSearchDelayMs: readSetting(raw, 'cascade_search_delay_ms', s.cascade_search_delay_ms, d.cascadeSearchDelayMs)
  };
}

export function clampSyncInterval(minutes: number): number {
  return Math.min(RSS_SYNC_MAX_INTERVAL_MINUTES, Math.max(RSS_SYNC_MIN_INTERVAL_MINUTES, minutes));
}

/**
 * Tightest of the RSS age limit and indexer retention, in days. Zero means
 * no cutoff.
 */
export function effectiveAgeLimitDays(config: EngineConfig): number {
  const limits = [config.rssReleaseAgeLimitDays, config.indexerRetentionDays].filter(days => days > 0);
  return limits.length > 0 ? Math.min(...limits) : 0;
}

export function warmupMsFromEnv(): number {
  const raw = process.env.RSS_SYNC_WARMUP_SECONDS;
  if (raw === undefined || raw.trim() === '') {
    return RSS_SYNC_DEFAULT_WARMUP_MS;
  }
  const seconds = Number(raw);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : RSS_SYNC_DEFAULT_WARMUP_MS;
}
