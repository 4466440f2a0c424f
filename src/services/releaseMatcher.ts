import logger from '../config/logger';
import type { MonitoredEvent } from '../models/Event';
import type { RawRelease } from '../types/release';

export interface ValidationResult {
  isMatch: boolean;
  confidence: number;
  isHardRejection: boolean;
  reasons: string[];
}

export interface MatchResult {
  event: MonitoredEvent;
  confidence: number;
  isHardRejection: boolean;
}

export const MIN_MATCH_CONFIDENCE = 60;

const NOISE_WORDS = new Set(['the', 'vs', 'at', 'in', 'on', 'and', 'or', 'for']);
const YEAR = /^(19|20)\d{2}$/;
const DATE_IN_TITLE = /\b((?:19|20)\d{2})[\s._-](\d{2})[\s._-](\d{2})\b/;
const DAY_MS = 24 * 60 * 60 * 1000;

// Share of confidence carried by the headline ("UFC 300") when the title has a subtitle
const HEADLINE_WEIGHT = 0.7;

export function tokenize(text: string): string[] {
  return text.toLowerCase().split(/[^a-z0-9]+/).filter(word => word.length > 0);
}

export function extractKeywords(title: string): string[] {
  const keywords = tokenize(title).filter(word => word.length >= 2 && !NOISE_WORDS.has(word));
  return [...new Set(keywords)];
}

function share(keywords: string[], words: Set<string>): number {
  if (keywords.length === 0) return 0;
  return keywords.filter(keyword => words.has(keyword)).length / keywords.length;
}

function splitHeadline(title: string): { headline: string; subtitle: string } {
  const match = title.match(/^(.+?)\s*(?::|\s-\s)\s*(.+)$/);
  return match ? { headline: match[1], subtitle: match[2] } : { headline: title, subtitle: '' };
}

function parseEventDate(value: string | null): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function teamMentioned(team: string, words: Set<string>): boolean {
  return extractKeywords(team).filter(word => word.length >= 3).some(word => words.has(word));
}

/**
 * Scores how well a release title names an event. Hard rejections win over
 * any confidence.
 */
export function validateRelease(release: Pick<RawRelease, 'title'>, event: MonitoredEvent): ValidationResult {
  const words = new Set(tokenize(release.title));
  const reasons: string[] = [];
  let isHardRejection = false;

  const { headline, subtitle } = splitHeadline(event.title);
  const headlineKeywords = extractKeywords(headline);
  const subtitleKeywords = extractKeywords(subtitle).filter(word => !headlineKeywords.includes(word));

  const headlineShare = share(headlineKeywords, words);
  const confidence = subtitleKeywords.length > 0 && headlineKeywords.length > 0
    ? Math.round(100 * (HEADLINE_WEIGHT * headlineShare + (1 - HEADLINE_WEIGHT) * share(subtitleKeywords, words)))
    : Math.round(100 * share([...headlineKeywords, ...subtitleKeywords], words));

  // Card numbers: "UFC 300" must not match "UFC 299"
  for (const keyword of headlineKeywords) {
    if (/^\d+$/.test(keyword) && !YEAR.test(keyword) && !words.has(keyword)) {
      isHardRejection = true;
      reasons.push(`Event number ${keyword} not in release`);
    }
  }

  const eventDate = parseEventDate(event.event_date);
  if (eventDate) {
    const eventYear = String(eventDate.getUTCFullYear());
    const releaseYears = [...words].filter(word => YEAR.test(word));
    if (releaseYears.length > 0 && !releaseYears.includes(eventYear)) {
      isHardRejection = true;
      reasons.push(`Year mismatch: release ${releaseYears.join('/')}, event ${eventYear}`);
    }

    const dateMatch = release.title.match(DATE_IN_TITLE);
    if (dateMatch) {
      const releaseDate = Date.UTC(Number(dateMatch[1]), Number(dateMatch[2]) - 1, Number(dateMatch[3]));
      if (!Number.isNaN(releaseDate) && Math.abs(releaseDate - eventDate.getTime()) > DAY_MS) {
        isHardRejection = true;
        reasons.push(`Date mismatch: release ${dateMatch[1]}-${dateMatch[2]}-${dateMatch[3]}`);
      }
    }
  }

  const teams = [event.home_team, event.away_team].filter((team): team is string => !!team);
  if (teams.length > 0 && !teams.some(team => teamMentioned(team, words))) {
    isHardRejection = true;
    reasons.push('Neither team named in release');
  }

  return {
    isMatch: !isHardRejection && confidence >= MIN_MATCH_CONFIDENCE,
    confidence,
    isHardRejection,
    reasons
  };
}

/**
 * Cheap test run before full validation: some title keyword appears anywhere
 * in the release title.
 */
export function passesKeywordFilter(releaseTitle: string, event: Pick<MonitoredEvent, 'title'>): boolean {
  const lowered = releaseTitle.toLowerCase();
  return extractKeywords(event.title).some(keyword => lowered.includes(keyword));
}

function dateDistance(event: MonitoredEvent, now: number): number {
  const date = parseEventDate(event.event_date);
  return date ? Math.abs(date.getTime() - now) : Number.POSITIVE_INFINITY;
}

/**
 * First event the release validates against, trying the events dated nearest
 * to now first.
 */
export function findMatch(release: Pick<RawRelease, 'title'>, candidates: MonitoredEvent[], now: Date = new Date()): MatchResult | null {
  const nowMs = now.getTime();
  const ordered = candidates
    .filter(event => passesKeywordFilter(release.title, event))
    .sort((a, b) => dateDistance(a, nowMs) - dateDistance(b, nowMs));

  for (const event of ordered) {
    const result = validateRelease(release, event);
    if (result.isMatch && !result.isHardRejection) {
      logger.debug(`[Matcher] "${release.title}" matches "${event.title}" (confidence: ${result.confidence}%)`);
      return { event, confidence: result.confidence, isHardRejection: false };
    }
  }
  return null;
}
