import logger from '../config/logger';

export interface DetectedPart {
  name: string;
  number: number;
  suffix: string;
}

export interface SegmentDefinition {
  name: string;
  number: number;
  patterns: RegExp[];
}

const SEGMENTED_SPORTS = new Set(['fighting', 'mma', 'boxing', 'kickboxing', 'muay thai', 'wrestling']);

const MEDIA_EXTENSION = /\.(mkv|mp4|avi|m4v|ts|wmv|mov|webm)$/i;

// Most specific first: "Early Prelims" must be tried before "Prelims"
const SEGMENTS: readonly SegmentDefinition[] = [
  {
    name: 'Early Prelims',
    number: 1,
    patterns: [/\bearly[\s._-]*prelims?\b/i, /\bearly[\s._-]*card\b/i, /\bep\b/i]
  },
  {
    name: 'Prelims',
    number: 2,
    patterns: [/(?<!early[\s._-]*)\bprelims?\b(?![\s._-]*(main|ppv))/i, /\bprelim[\s._-]*card\b/i, /\bundercard\b/i]
  },
  {
    name: 'Main Card',
    number: 3,
    patterns: [/\bmain[\s._-]*card\b/i, /\bmain[\s._-]*event\b/i, /\bppv\b/i, /\bmain[\s._-]*show\b/i, /\bmc\b/i]
  },
  {
    name: 'Post Show',
    number: 4,
    patterns: [/\bpost[\s._-]*(show|fight|event)\b/i, /\bpost[\s._-]*fight[\s._-]*show\b/i]
  }
];

export function isSegmentedSport(sport: string | null | undefined): boolean {
  return !!sport && SEGMENTED_SPORTS.has(sport.trim().toLowerCase());
}

export function cleanTitle(title: string): string {
  return title.replace(MEDIA_EXTENSION, '').replace(/[._-]/g, ' ').replace(/\s+/g, ' ').trim();
}

/**
 * Segment of a broadcast named in a release title. Null for full events and
 * for every sport that is not split into segments.
 */
export function detectPart(title: string, sport: string | null | undefined): DetectedPart | null {
  if (!isSegmentedSport(sport)) {
    return null;
  }

  const cleaned = cleanTitle(title);
  for (const segment of SEGMENTS) {
    if (segment.patterns.some(pattern => pattern.test(cleaned))) {
      logger.debug(`[Part Detector] "${title}" -> ${segment.name}`);
      return { name: segment.name, number: segment.number, suffix: `pt${segment.number}` };
    }
  }
  return null;
}

export function getAvailableSegments(sport: string | null | undefined): string[] {
  return isSegmentedSport(sport) ? SEGMENTS.map(segment => segment.name) : [];
}

export function getSegmentDefinitions(): Array<{ name: string; number: number; suffix: string }> {
  return SEGMENTS.map(segment => ({ name: segment.name, number: segment.number, suffix: `pt${segment.number}` }));
}

/**
 * Canonical segment name for user input such as "main card". Null when unknown.
 */
export function canonicalSegmentName(name: string): string | null {
  const wanted = name.trim().toLowerCase();
  return SEGMENTS.find(segment => segment.name.toLowerCase() === wanted)?.name ?? null;
}

export function isKnownSegment(name: string): boolean {
  return canonicalSegmentName(name) !== null;
}
