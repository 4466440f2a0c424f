import type { CustomFormat } from '../models/CustomFormat';
import type { MonitoredEvent } from '../models/Event';
import type { QualityProfile } from '../models/QualityProfile';
import type { ReleaseProfile } from '../models/ReleaseProfile';
import { EvaluatedRelease, RawRelease, computeTotalScore, toEvaluatedRelease } from '../types/release';
import { matchFormats } from './customFormatMatcher';
import { detectPart, isSegmentedSport } from './partDetector';
import { calculateQualityScore, parseQuality } from './qualityParser';
import { evaluateReleaseProfiles } from './releaseProfile';

export interface EvaluationOptions {
  profile: QualityProfile | undefined;
  customFormats: CustomFormat[];
  // Only this segment is wanted (manual or cascading part searches)
  requestedPart: string | null;
  sport: string | null;
  multiPartEnabled: boolean;
  monitoredParts?: string[];
}

export interface EvaluationResult {
  quality: string;
  qualityScore: number;
  customFormatScore: number;
  totalScore: number;
  approved: boolean;
  rejections: string[];
  matchedFormats: string[];
  part: string | null;
}

export function multiPartRejection(part: string | null, sport: string | null, multiPartEnabled: boolean): string | null {
  if (!isSegmentedSport(sport)) return null;
  if (multiPartEnabled && part === null) return 'Full event file (multi-part enabled)';
  if (!multiPartEnabled && part !== null) return `Part file '${part}' (multi-part disabled)`;
  return null;
}

export function evaluateRelease(release: Pick<RawRelease, 'title' | 'size'>, options: EvaluationOptions): EvaluationResult {
  const quality = parseQuality(release.title);
  const qualityScore = calculateQualityScore(quality);
  const part = detectPart(release.title, options.sport)?.name ?? null;
  const rejections: string[] = [];

  const policy = multiPartRejection(part, options.sport, options.multiPartEnabled);
  if (policy) {
    rejections.push(policy);
  }

  if (options.requestedPart !== null && part !== options.requestedPart) {
    rejections.push(`Wanted part '${options.requestedPart}' but release is ${part ? `'${part}'` : 'the full event'}`);
  }

  const monitored = options.monitoredParts ?? [];
  if (part !== null && options.multiPartEnabled && monitored.length > 0 && !monitored.includes(part)) {
    rejections.push(`Segment not monitored: ${part}`);
  }

  const matched = matchFormats(options.customFormats, { title: release.title, size: release.size, quality });
  const profile = options.profile;
  let customFormatScore = 0;
  if (profile) {
    for (const format of matched) {
      customFormatScore += profile.format_scores[format.id] ?? 0;
    }

    if (profile.items.length > 0) {
      const item = profile.items.find(entry => entry.quality.toLowerCase() === quality.name.toLowerCase());
      if (!item || !item.allowed) {
        rejections.push(`Quality ${quality.name} is not allowed by profile '${profile.name}'`);
      }
    }

    if (customFormatScore < profile.min_custom_format_score) {
      rejections.push(`Custom format score ${customFormatScore} is below minimum ${profile.min_custom_format_score}`);
    }
  }

  return {
    quality: quality.name,
    qualityScore,
    customFormatScore,
    totalScore: qualityScore + customFormatScore,
    approved: rejections.length === 0,
    rejections,
    matchedFormats: matched.map(format => format.name),
    part
  };
}

export interface ScoringContext {
  profile: QualityProfile | undefined;
  customFormats: CustomFormat[];
  releaseProfiles: ReleaseProfile[];
  multiPartEnabled: boolean;
  requestedPart?: string | null;
  matchConfidence?: number;
}

/**
 * Full scoring of a raw release for one event: part, quality, formats and
 * release profiles.
 */
export function scoreRelease(raw: RawRelease, event: MonitoredEvent, context: ScoringContext): EvaluatedRelease {
  const evaluation = evaluateRelease(raw, {
    profile: context.profile,
    customFormats: context.customFormats,
    requestedPart: context.requestedPart ?? null,
    sport: event.sport,
    multiPartEnabled: context.multiPartEnabled,
    monitoredParts: event.monitored_parts
  });
  const profileResult = evaluateReleaseProfiles(raw, context.releaseProfiles);
  const rejections = [...evaluation.rejections, ...profileResult.rejections];

  const scores = {
    qualityScore: evaluation.qualityScore,
    customFormatScore: evaluation.customFormatScore,
    preferredScore: profileResult.preferredScore
  };

  return {
    ...toEvaluatedRelease(raw),
    ...scores,
    matchConfidence: context.matchConfidence ?? 0,
    part: evaluation.part,
    qualityName: evaluation.quality,
    totalScore: computeTotalScore(scores),
    approved: evaluation.approved && !profileResult.isRejected && rejections.length === 0,
    rejections,
    matchedFormats: evaluation.matchedFormats
  };
}
