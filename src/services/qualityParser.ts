export type Resolution = '2160p' | '1080p' | '720p' | '576p' | '540p' | '480p' | '360p';
export type Source = 'BluRay' | 'WEB-DL' | 'WEBRip' | 'HDTV' | 'DVDRip' | 'SDTV';

export interface ParsedQuality {
  resolution: Resolution | null;
  source: Source | null;
  codec: string | null;
  releaseGroup: string | null;
  // Profile-facing quality name, e.g. "WEBDL-1080p"
  name: string;
}

export const RESOLUTION_SCORES: Record<Resolution, number> = {
  '2160p': 1000,
  '1080p': 800,
  '720p': 600,
  '576p': 400,
  '540p': 400,
  '480p': 400,
  '360p': 200
};

export const SOURCE_SCORES: Record<Source, number> = {
  'BluRay': 100,
  'WEB-DL': 90,
  'WEBRip': 85,
  'HDTV': 70,
  'DVDRip': 60,
  'SDTV': 40
};

const RESOLUTION_PATTERNS: Array<[RegExp, Resolution]> = [
  [/\b(2160p|4k|uhd)\b/i, '2160p'],
  [/\b1080[pi]\b/i, '1080p'],
  [/\b720p\b/i, '720p'],
  [/\b576p\b/i, '576p'],
  [/\b540p\b/i, '540p'],
  [/\b480p\b/i, '480p'],
  [/\b360p\b/i, '360p']
];

// WEBRip before WEB-DL: a bare "WEB" counts as WEB-DL
const SOURCE_PATTERNS: Array<[RegExp, Source]> = [
  [/\b(blu[\s.-]?ray|bdrip|brrip|bdremux|remux)\b/i, 'BluRay'],
  [/\bweb[\s.-]?rip\b/i, 'WEBRip'],
  [/\b(web[\s.-]?dl|web)\b/i, 'WEB-DL'],
  [/\bhdtv\b/i, 'HDTV'],
  [/\b(dvdrip|dvd)\b/i, 'DVDRip'],
  [/\b(sdtv|pdtv|dsr|tvrip)\b/i, 'SDTV']
];

const CODEC_PATTERNS: Array<[RegExp, string]> = [
  [/\b(x265|h\.?265|hevc)\b/i, 'x265'],
  [/\b(x264|h\.?264|avc)\b/i, 'x264'],
  [/\bav1\b/i, 'AV1'],
  [/\bxvid\b/i, 'XviD']
];

const TRAILING_EXTENSION = /\.(mkv|mp4|avi|m4v|ts|wmv|mov|webm|nzb|torrent)$/i;
const NOT_A_GROUP = new Set(['dl', 'rip', 'web']);

function firstMatch<T>(title: string, patterns: Array<[RegExp, T]>): T | null {
  for (const [pattern, value] of patterns) {
    if (pattern.test(title)) return value;
  }
  return null;
}

export function parseReleaseGroup(title: string): string | null {
  const match = title.replace(TRAILING_EXTENSION, '').match(/-([A-Za-z0-9]+)$/);
  if (!match || NOT_A_GROUP.has(match[1].toLowerCase())) {
    return null;
  }
  return match[1];
}

export function qualityName(resolution: Resolution | null, source: Source | null): string {
  switch (source) {
    case 'BluRay':
      return `Bluray-${resolution ?? '480p'}`;
    case 'WEB-DL':
      return `WEBDL-${resolution ?? '480p'}`;
    case 'WEBRip':
      return `WEBRip-${resolution ?? '480p'}`;
    case 'HDTV':
      return resolution ? `HDTV-${resolution}` : 'SDTV';
    case 'DVDRip':
      return 'DVD';
    case 'SDTV':
      return 'SDTV';
    case null:
      return resolution ? `HDTV-${resolution}` : 'Unknown';
  }
}

export function parseQuality(title: string): ParsedQuality {
  const resolution = firstMatch(title, RESOLUTION_PATTERNS);
  const source = firstMatch(title, SOURCE_PATTERNS);

  return {
    resolution,
    source,
    codec: firstMatch(title, CODEC_PATTERNS),
    releaseGroup: parseReleaseGroup(title),
    name: qualityName(resolution, source)
  };
}

export function calculateQualityScore(quality: Pick<ParsedQuality, 'resolution' | 'source'>): number {
  const resolutionScore = quality.resolution ? RESOLUTION_SCORES[quality.resolution] : 0;
  const sourceScore = quality.source ? SOURCE_SCORES[quality.source] : 0;
  return resolutionScore + sourceScore;
}
