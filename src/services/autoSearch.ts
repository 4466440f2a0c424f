import { loadEngineConfig } from '../config/engineConfig';
import logger from '../config/logger';
import { CustomFormatModel } from '../models/CustomFormat';
import { EventModel } from '../models/Event';
import { QualityProfileModel } from '../models/QualityProfile';
import { ReleaseProfileModel } from '../models/ReleaseProfile';
import type { EvaluatedRelease, RawRelease } from '../types/release';
import { errorMessage } from '../utils/errors';
import type { DecisionEngine } from './decisionEngine';
import type { IndexerSource } from './indexer';
import { parseQuality } from './qualityParser';
import { validateRelease } from './releaseMatcher';
import { scoreRelease } from './releaseEvaluator';
import type { ResultCache } from './resultCache';

export interface SearchCandidate {
  title: string;
  indexer: string;
  part: string | null;
  quality: string;
  totalScore: number;
  approved: boolean;
  rejections: string[];
}

export interface AutoSearchResult {
  success: boolean;
  message: string;
  downloadId?: string;
  candidates: SearchCandidate[];
}

function toCandidate(release: EvaluatedRelease): SearchCandidate {
  return {
    title: release.title,
    indexer: release.indexer,
    part: release.part,
    quality: release.qualityName,
    totalScore: release.totalScore,
    approved: release.approved,
    rejections: release.rejections
  };
}

function restrictToResolution(release: EvaluatedRelease, resolution: string): EvaluatedRelease {
  const found = parseQuality(release.title).resolution;
  if (found === resolution) return release;
  return {
    ...release,
    approved: false,
    rejections: [...release.rejections, `Resolution ${found ?? 'unknown'} does not match ${resolution}`]
  };
}

/**
 * Searches every automatic-search indexer for one event (optionally one
 * part of it) and grabs the best acceptable release. A resolution limits the
 * grab to releases at that resolution.
 */
export class AutoSearchService {
  constructor(
    private readonly engine: DecisionEngine,
    private readonly indexers: IndexerSource,
    private readonly cache: ResultCache
  ) {}

  async searchEvent(eventId: string, part: string | null = null, resolution: string | null = null): Promise<AutoSearchResult> {
    const event = EventModel.findById(eventId);
    if (!event) {
      return { success: false, message: 'Event not found', candidates: [] };
    }

    const config = loadEngineConfig();
    const label = part ? `${event.title} (${part})` : event.title;
    logger.info(`[AutoSearch] Searching for ${label}`);

    // Part searches share the base query's cache bucket
    const releases: RawRelease[] = this.cache.tryGet(event.title, config.searchCacheDurationSeconds) ?? await this.queryIndexers(event.title, config.searchCacheDurationSeconds);

    const profile = event.quality_profile_id ? QualityProfileModel.findById(event.quality_profile_id) : undefined;
    const customFormats = CustomFormatModel.findAll();
    const releaseProfiles = ReleaseProfileModel.findEnabled();

    const scored: EvaluatedRelease[] = [];
    for (const release of releases) {
      const validation = validateRelease(release, event);
      if (!validation.isMatch || validation.isHardRejection) continue;

      const evaluated = scoreRelease(release, event, {
        profile,
        customFormats,
        releaseProfiles,
        multiPartEnabled: config.enableMultiPartEpisodes,
        requestedPart: part,
        matchConfidence: validation.confidence
      });
      scored.push(resolution ? restrictToResolution(evaluated, resolution) : evaluated);
    }
    scored.sort((a, b) => b.totalScore - a.totalScore);

    const candidates = scored.map(toCandidate);
    for (const release of scored.filter(candidate => candidate.approved)) {
      const outcome = await this.engine.process(event, release, config);
      if (outcome.grabbed) {
        return {
          success: true,
          message: `Grabbed ${release.title}`,
          downloadId: outcome.grab?.downloadId,
          candidates
        };
      }
      if (outcome.grab && !outcome.grab.success) {
        return { success: false, message: outcome.grab.message, candidates };
      }
    }

    logger.info(`[AutoSearch] No acceptable release for ${label} (${scored.length} candidates)`);
    return { success: false, message: 'No acceptable release found', candidates };
  }

  private async queryIndexers(query: string, retainSeconds: number): Promise<RawRelease[]> {
    const indexers = this.indexers.getIndexersForSearch();
    const releases: RawRelease[] = [];
    const queried: string[] = [];

    for (const indexer of indexers) {
      try {
        releases.push(...await this.indexers.search(indexer, query));
        queried.push(indexer.name);
      } catch (error) {
        logger.warn(`[AutoSearch] ${indexer.name} skipped: ${errorMessage(error)}`);
      }
    }

    this.cache.store(query, releases, queried, retainSeconds);
    return releases;
  }
}
