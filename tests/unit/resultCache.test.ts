import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ResultCache } from '../../src/services/resultCache';
import { rawRelease } from '../helpers';

describe('ResultCache', () => {
  let cache: ResultCache;

  beforeEach(() => {
    cache = new ResultCache();
  });

  afterEach(() => {
    cache.close();
    vi.restoreAllMocks();
  });

  it('normalizes queries by trimming and lowercasing', () => {
    expect(ResultCache.normalizeQuery('  UFC 300 ')).toBe('ufc 300');
  });

  it('returns stored releases as fresh working copies', () => {
    cache.store('UFC 300', [rawRelease({ quality: 'WEBDL-1080p' })], ['TestIndexer']);

    const hit = cache.tryGet(' ufc 300', 60);

    expect(hit).toHaveLength(1);
    expect(hit?.[0]).toMatchObject({
      guid: 'guid-1',
      qualityName: 'WEBDL-1080p',
      part: null,
      qualityScore: 0,
      totalScore: 0,
      approved: true,
      rejections: []
    });
  });

  it('does not leak changes made by one reader to the next', () => {
    cache.store('UFC 300', [rawRelease()]);

    const first = cache.tryGet('UFC 300', 60);
    if (!first) throw new Error('expected a cache hit');
    first[0].approved = false;
    first[0].rejections.push('Blocklisted');
    first[0].totalScore = 999;

    const second = cache.tryGet('UFC 300', 60);
    expect(second?.[0].approved).toBe(true);
    expect(second?.[0].rejections).toEqual([]);
    expect(second?.[0].totalScore).toBe(0);
  });

  it('treats entries older than the caller\'s max age as a miss and drops them', () => {
    const now = 1_700_000_000_000;
    const clock = vi.spyOn(Date, 'now').mockReturnValue(now);
    cache.store('UFC 300', [rawRelease()]);

    clock.mockReturnValue(now + 61_000);
    expect(cache.tryGet('UFC 300', 60)).toBeUndefined();
    // Dropped, so a more lenient reader misses too
    expect(cache.tryGet('UFC 300', 600)).toBeUndefined();
  });

  it('serves entries within the caller\'s max age', () => {
    const now = 1_700_000_000_000;
    const clock = vi.spyOn(Date, 'now').mockReturnValue(now);
    cache.store('UFC 300', [rawRelease()]);

    clock.mockReturnValue(now + 59_000);
    expect(cache.tryGet('UFC 300', 60)).toHaveLength(1);
  });

  it('purges entries past the hard ceiling regardless of max age', () => {
    const now = 1_700_000_000_000;
    const clock = vi.spyOn(Date, 'now').mockReturnValue(now);
    cache.store('UFC 300', [rawRelease()]);

    clock.mockReturnValue(now + 301_000);
    expect(cache.tryGet('UFC 300', 3600)).toBeUndefined();
  });

  it('keeps entries past the hard ceiling when stored with a longer retention', () => {
    const now = 1_700_000_000_000;
    const clock = vi.spyOn(Date, 'now').mockReturnValue(now);
    cache.store('UFC 300', [rawRelease()], ['TestIndexer'], 900);

    clock.mockReturnValue(now + 600_000);
    expect(cache.tryGet('UFC 300', 900)).toHaveLength(1);

    clock.mockReturnValue(now + 901_000);
    expect(cache.tryGet('UFC 300', 3600)).toBeUndefined();
  });

  it('reports entry and release counts', () => {
    cache.store('UFC 300', [rawRelease({ guid: 'a' }), rawRelease({ guid: 'b' })]);
    cache.store('UFC 301', [rawRelease({ guid: 'c' })]);

    expect(cache.getStats()).toEqual({ entryCount: 2, totalReleases: 3 });
  });

  it('invalidates a single query', () => {
    cache.store('UFC 300', [rawRelease()]);

    expect(cache.invalidate('ufc 300')).toBe(true);
    expect(cache.invalidate('ufc 300')).toBe(false);
    expect(cache.tryGet('UFC 300', 60)).toBeUndefined();
  });

  it('clears every entry', () => {
    cache.store('UFC 300', [rawRelease()]);
    cache.store('UFC 301', [rawRelease()]);

    cache.clear();

    expect(cache.getStats()).toEqual({ entryCount: 0, totalReleases: 0 });
  });
});
