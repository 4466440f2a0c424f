import { setTimeout as sleep } from 'timers/promises';
import { effectiveAgeLimitDays, loadEngineConfig } from '../config/engineConfig';
import logger from '../config/logger';
import { CustomFormatModel } from '../models/CustomFormat';
import { EventModel } from '../models/Event';
import { QualityProfile, QualityProfileModel } from '../models/QualityProfile';
import { ReleaseProfileModel } from '../models/ReleaseProfile';
import type { RawRelease } from '../types/release';
import { errorMessage } from '../utils/errors';
import type { DecisionEngine } from './decisionEngine';
import type { IndexerSource } from './indexer';
import { findMatch } from './releaseMatcher';
import { scoreRelease } from './releaseEvaluator';

export interface RssSyncResult {
  indexersChecked: number;
  releasesFetched: number;
  releasesConsidered: number;
  matched: number;
  grabbed: number;
  upgraded: number;
  // Releases that threw while being matched, scored or grabbed
  errors: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Waits unless aborted first. Resolves false on abort.
 */
export async function waitFor(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  if (ms <= 0) return true;
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (error) {
    if (signal?.aborted) return false;
    throw error;
  }
}

export function isWithinAgeLimit(release: Pick<RawRelease, 'publishDate'>, maxAgeDays: number, now: number): boolean {
  if (maxAgeDays <= 0) return true;
  const published = new Date(release.publishDate).getTime();
  // Undated releases are kept
  if (Number.isNaN(published)) return true;
  return now - published <= maxAgeDays * DAY_MS;
}

/**
 * One pass over every RSS-enabled indexer: fetch, match against monitored
 * events, score and hand to the decision engine.
 */
export class RssSyncService {
  constructor(
    private readonly indexers: IndexerSource,
    private readonly engine: DecisionEngine
  ) {}

  async runCycle(signal?: AbortSignal): Promise<RssSyncResult> {
    const result: RssSyncResult = { indexersChecked: 0, releasesFetched: 0, releasesConsidered: 0, matched: 0, grabbed: 0, upgraded: 0, errors: 0 };
    const config = loadEngineConfig();

    logger.info('[RSS Sync] Starting RSS sync...');
    const indexers = this.indexers.getIndexersForRss();
    if (indexers.length === 0) {
      logger.info('[RSS Sync] No indexers enabled for RSS');
      return result;
    }

    const fetched: RawRelease[] = [];
    for (const indexer of indexers) {
      if (signal?.aborted) return result;
      try {
        const releases = await this.indexers.fetchRss(indexer, config.maxRssReleasesPerIndexer);
        fetched.push(...releases);
        result.indexersChecked++;
      } catch (error) {
        logger.warn(`[RSS Sync] Skipping ${indexer.name} this cycle: ${errorMessage(error)}`);
      }
    }
    result.releasesFetched = fetched.length;

    const now = Date.now();
    const maxAgeDays = effectiveAgeLimitDays(config);
    const seen = new Set<string>();
    const releases = fetched.filter(release => {
      if (seen.has(release.guid)) return false;
      seen.add(release.guid);
      return isWithinAgeLimit(release, maxAgeDays, now);
    });
    result.releasesConsidered = releases.length;

    const events = EventModel.findMonitored();
    if (events.length === 0 || releases.length === 0) {
      logger.info(`[RSS Sync] Nothing to match: ${releases.length} releases, ${events.length} monitored events`);
      return result;
    }

    const profiles = new Map<string, QualityProfile>();
    for (const profile of QualityProfileModel.findAll()) {
      profiles.set(profile.id, profile);
    }
    const customFormats = CustomFormatModel.findAll();
    const releaseProfiles = ReleaseProfileModel.findEnabled();

    for (const release of releases) {
      if (signal?.aborted) {
        logger.info('[RSS Sync] Cancelled, stopping mid-cycle');
        break;
      }

      try {
        const match = findMatch(release, events, new Date(now));
        if (!match) continue;
        result.matched++;

        const event = match.event;
        const evaluated = scoreRelease(release, event, {
          profile: event.quality_profile_id ? profiles.get(event.quality_profile_id) : undefined,
          customFormats,
          releaseProfiles,
          multiPartEnabled: config.enableMultiPartEpisodes,
          matchConfidence: match.confidence
        });

        if (!evaluated.approved) {
          logger.debug(`[RSS Sync] Rejected "${release.title}": ${evaluated.rejections.join('; ')}`);
          continue;
        }

        const outcome = await this.engine.process(event, evaluated, config);
        if (outcome.grabbed) {
          result.grabbed++;
          if (outcome.decision.isUpgrade) result.upgraded++;
          await waitFor(config.grabDelayMs, signal);
        }
      } catch (error) {
        result.errors++;
        logger.error(`[RSS Sync] Error processing "${release.title}": ${errorMessage(error)}`, error);
      }
    }

    logger.info(
      `[RSS Sync] Sync complete: ${result.releasesFetched} fetched, ${result.releasesConsidered} considered, ` +
      `${result.matched} matched, ${result.grabbed} grabbed, ${result.upgraded} upgrades, ${result.errors} errors`
    );
    return result;
  }
}
