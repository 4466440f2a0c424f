export type Protocol = 'torrent' | 'usenet';

/**
 * What an indexer reported about a release. Never mutated after parsing.
 */
export interface RawRelease {
  guid: string;
  title: string;
  downloadUrl: string;
  infoUrl?: string;
  indexer: string;
  indexerId?: string;
  size: number;
  publishDate: string;
  seeders?: number;
  leechers?: number;
  infoHash?: string;
  protocol: Protocol;
  quality?: string;
  codec?: string;
  source?: string;
}

/**
 * A raw release scored against one event. Rebuilt for every event it is
 * evaluated against.
 */
export interface EvaluatedRelease extends RawRelease {
  matchConfidence: number;
  part: string | null;
  qualityName: string;
  qualityScore: number;
  customFormatScore: number;
  preferredScore: number;
  totalScore: number;
  approved: boolean;
  rejections: string[];
  matchedFormats: string[];
}

export function toRawRelease(release: RawRelease): RawRelease {
  return {
    guid: release.guid,
    title: release.title,
    downloadUrl: release.downloadUrl,
    infoUrl: release.infoUrl,
    indexer: release.indexer,
    indexerId: release.indexerId,
    size: release.size,
    publishDate: release.publishDate,
    seeders: release.seeders,
    leechers: release.leechers,
    infoHash: release.infoHash,
    protocol: release.protocol,
    quality: release.quality,
    codec: release.codec,
    source: release.source
  };
}

/**
 * Fresh working copy with every event-specific field at its neutral value.
 */
export function toEvaluatedRelease(release: RawRelease): EvaluatedRelease {
  return {
    ...toRawRelease(release),
    matchConfidence: 0,
    part: null,
    qualityName: release.quality ?? 'Unknown',
    qualityScore: 0,
    customFormatScore: 0,
    preferredScore: 0,
    totalScore: 0,
    approved: true,
    rejections: [],
    matchedFormats: []
  };
}

export function computeTotalScore(release: Pick<EvaluatedRelease, 'qualityScore' | 'customFormatScore' | 'preferredScore'>): number {
  return release.qualityScore + release.customFormatScore + release.preferredScore;
}
