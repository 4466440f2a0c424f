import NodeCache from 'node-cache';
import logger from '../config/logger';
import { EvaluatedRelease, RawRelease, toEvaluatedRelease, toRawRelease } from '../types/release';

interface CacheEntry {
  query: string;
  releases: RawRelease[];
  cachedAt: number;
  indexersQueried: string[];
}

export interface ResultCacheStats {
  entryCount: number;
  totalReleases: number;
}

export interface ResultCacheOptions {
  // Entries older than this are purged whether or not they are read
  hardTtlSeconds?: number;
  checkPeriodSeconds?: number;
}

export const DEFAULT_HARD_TTL_SECONDS = 300;

/**
 * Short-lived store of raw indexer results keyed by normalized query. Only
 * indexer facts are kept; readers always get fresh, unscored releases.
 */
export class ResultCache {
  private readonly cache: NodeCache;
  private readonly hardTtlSeconds: number;

  constructor(options: ResultCacheOptions = {}) {
    this.hardTtlSeconds = options.hardTtlSeconds ?? DEFAULT_HARD_TTL_SECONDS;
    this.cache = new NodeCache({
      stdTTL: this.hardTtlSeconds,
      checkperiod: options.checkPeriodSeconds ?? 60,
      useClones: false
    });
  }

  static normalizeQuery(query: string): string {
    return query.trim().toLowerCase();
  }

  tryGet(query: string, maxAgeSeconds: number): EvaluatedRelease[] | undefined {
    const key = ResultCache.normalizeQuery(query);
    const entry = this.cache.get<CacheEntry>(key);
    if (!entry) {
      return undefined;
    }

    const ageMs = Date.now() - entry.cachedAt;
    if (ageMs > maxAgeSeconds * 1000) {
      this.cache.del(key);
      logger.debug(`[ReleaseCache] Expired entry for "${key}" (${Math.round(ageMs / 1000)}s old)`);
      return undefined;
    }

    logger.debug(`[ReleaseCache] Hit for "${key}": ${entry.releases.length} releases`);
    return entry.releases.map(toEvaluatedRelease);
  }

  /**
   * `retainSeconds` keeps the entry past the hard ceiling for readers that
   * accept older results.
   */
  store(query: string, releases: readonly RawRelease[], indexersQueried: string[] = [], retainSeconds: number = 0): void {
    const key = ResultCache.normalizeQuery(query);
    this.cache.set<CacheEntry>(key, {
      query: key,
      releases: releases.map(toRawRelease),
      cachedAt: Date.now(),
      indexersQueried: [...indexersQueried]
    }, Math.max(this.hardTtlSeconds, retainSeconds));
    logger.debug(`[ReleaseCache] Stored ${releases.length} releases for "${key}" from ${indexersQueried.length} indexers`);
  }

  invalidate(query: string): boolean {
    return this.cache.del(ResultCache.normalizeQuery(query)) > 0;
  }

  clear(): void {
    this.cache.flushAll();
    logger.info('[ReleaseCache] Cleared');
  }

  getStats(): ResultCacheStats {
    let entryCount = 0;
    let totalReleases = 0;
    for (const key of this.cache.keys()) {
      // get() drops entries past the hard ceiling
      const entry = this.cache.get<CacheEntry>(key);
      if (entry) {
        entryCount++;
        totalReleases += entry.releases.length;
      }
    }
    return { entryCount, totalReleases };
  }

  close(): void {
    this.cache.close();
  }
}

export const resultCache = new ResultCache();
