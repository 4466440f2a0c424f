import logger from '../config/logger';
import { splitTerms, type ReleaseProfile } from '../models/ReleaseProfile';
import type { RawRelease } from '../types/release';

export interface ReleaseProfileResult {
  isRejected: boolean;
  rejections: string[];
  preferredScore: number;
}

function termMatches(title: string, term: string): boolean {
  try {
    return new RegExp(term, 'i').test(title);
  } catch (error) {
    logger.debug(`[ReleaseProfile] "${term}" is not a valid pattern, matching as text`, error);
    return title.toLowerCase().includes(term.toLowerCase());
  }
}

function appliesTo(profile: ReleaseProfile, indexerId: string | undefined): boolean {
  if (!profile.enabled) return false;
  if (profile.indexer_ids.length === 0) return true;
  return indexerId !== undefined && profile.indexer_ids.includes(indexerId);
}

/**
 * Required and ignored terms reject outright; preferred terms add their
 * score once each.
 */
export function evaluateReleaseProfiles(
  release: Pick<RawRelease, 'title' | 'indexerId'>,
  profiles: ReleaseProfile[]
): ReleaseProfileResult {
  const rejections: string[] = [];
  let preferredScore = 0;

  for (const profile of profiles) {
    if (!appliesTo(profile, release.indexerId)) continue;

    const required = profile.required.flatMap(splitTerms);
    const missing = required.filter(term => !termMatches(release.title, term));
    if (missing.length > 0) {
      rejections.push(`Release profile '${profile.name}': Missing required keyword(s): ${missing.join(', ')}`);
      continue;
    }

    const ignored = profile.ignored.flatMap(splitTerms).filter(term => termMatches(release.title, term));
    if (ignored.length > 0) {
      rejections.push(`Release profile '${profile.name}': Contains ignored keyword(s): ${ignored.join(', ')}`);
      continue;
    }

    for (const preferred of profile.preferred) {
      if (termMatches(release.title, preferred.term)) {
        preferredScore += preferred.score;
      }
    }
  }

  return { isRejected: rejections.length > 0, rejections, preferredScore };
}
