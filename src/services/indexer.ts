import axios from 'axios';
import xml2js from 'xml2js';
import { z } from 'zod';
import logger from '../config/logger';
import { IndexerConfig, IndexerModel, IndexerType } from '../models/Indexer';
import type { Protocol, RawRelease } from '../types/release';
import { ExternalServiceError, errorMessage } from '../utils/errors';
import { infoHashFromMagnet } from '../utils/magnet';
import { parseQuality } from './qualityParser';

/**
 * What the sync loop and automatic search need from indexers.
 */
export interface IndexerSource {
  getIndexersForRss(): IndexerConfig[];
  getIndexersForSearch(): IndexerConfig[];
  fetchRss(indexer: IndexerConfig, limit: number): Promise<RawRelease[]>;
  search(indexer: IndexerConfig, query: string): Promise<RawRelease[]>;
}

const REQUEST_TIMEOUT_MS = 30000;

const attrSchema = z.object({
  $: z.object({ name: z.string(), value: z.string() })
});

const itemSchema = z.object({
  title: z.array(z.string().min(1)).min(1),
  guid: z.array(z.union([z.string(), z.object({ _: z.string() })])).optional(),
  link: z.array(z.string()).optional(),
  comments: z.array(z.string()).optional(),
  pubDate: z.array(z.string()).optional(),
  size: z.array(z.string()).optional(),
  enclosure: z.array(z.object({
    $: z.object({ url: z.string(), length: z.string().optional() })
  })).optional(),
  'torznab:attr': z.array(attrSchema).optional(),
  'newznab:attr': z.array(attrSchema).optional()
});

const feedSchema = z.object({
  rss: z.object({
    channel: z.array(z.object({ item: z.array(z.unknown()).optional() })).min(1)
  })
});

type FeedItem = z.infer<typeof itemSchema>;

export function protocolForIndexer(type: IndexerType): Protocol {
  switch (type) {
    case 'torznab':
      return 'torrent';
    case 'newznab':
      return 'usenet';
  }
}

function toInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function publishDate(value: string | undefined): string {
  const date = value ? new Date(value) : null;
  return date && !Number.isNaN(date.getTime()) ? date.toISOString() : new Date().toISOString();
}

function mapItem(item: FeedItem, indexer: Pick<IndexerConfig, 'id' | 'name' | 'type'>): RawRelease | null {
  const title = item.title[0];
  const downloadUrl = item.enclosure?.[0]?.$.url || item.link?.[0] || '';
  if (!downloadUrl) {
    logger.debug(`[Indexer] ${indexer.name}: skipping "${title}" without a download link`);
    return null;
  }

  const attrs = new Map<string, string>();
  for (const attr of [...(item['torznab:attr'] ?? []), ...(item['newznab:attr'] ?? [])]) {
    attrs.set(attr.$.name.toLowerCase(), attr.$.value);
  }

  const protocol = protocolForIndexer(indexer.type);
  const seeders = toInt(attrs.get('seeders'));
  const peers = toInt(attrs.get('peers'));
  const rawGuid = item.guid?.[0];
  const guid = typeof rawGuid === 'string' ? rawGuid : rawGuid?._ ?? downloadUrl;
  const quality = parseQuality(title);

  return {
    guid,
    title,
    downloadUrl,
    infoUrl: item.comments?.[0],
    indexer: indexer.name,
    indexerId: indexer.id,
    size: toInt(attrs.get('size')) ?? toInt(item.enclosure?.[0]?.$.length) ?? toInt(item.size?.[0]) ?? 0,
    publishDate: publishDate(item.pubDate?.[0]),
    seeders: protocol === 'torrent' ? seeders ?? 0 : undefined,
    leechers: protocol === 'torrent' && peers !== undefined ? Math.max(0, peers - (seeders ?? 0)) : undefined,
    infoHash: protocol === 'torrent'
      ? attrs.get('infohash')?.toLowerCase() ?? infoHashFromMagnet(attrs.get('magneturl') ?? downloadUrl)
      : undefined,
    protocol,
    quality: quality.name,
    codec: quality.codec ?? undefined,
    source: quality.source ?? undefined
  };
}

/**
 * Parses a Torznab/Newznab RSS document. Malformed items are skipped.
 */
export async function parseFeed(xml: string, indexer: Pick<IndexerConfig, 'id' | 'name' | 'type'>): Promise<RawRelease[]> {
  const parser = new xml2js.Parser();
  const document: unknown = await parser.parseStringPromise(xml);

  const feed = feedSchema.safeParse(document);
  if (!feed.success) {
    logger.warn(`[Indexer] ${indexer.name}: response is not an RSS feed`);
    return [];
  }

  const releases: RawRelease[] = [];
  for (const entry of feed.data.rss.channel[0].item ?? []) {
    const item = itemSchema.safeParse(entry);
    if (!item.success) {
      logger.debug(`[Indexer] ${indexer.name}: skipping malformed item (${item.error.issues[0]?.message ?? 'invalid'})`);
      continue;
    }
    const release = mapItem(item.data, indexer);
    if (release) releases.push(release);
  }
  return releases;
}

function apiUrl(indexer: IndexerConfig): string {
  return indexer.url.endsWith('/api') ? indexer.url : indexer.url.replace(/\/?$/, '/api');
}

export class IndexerService implements IndexerSource {
  getIndexersForRss(): IndexerConfig[] {
    return IndexerModel.findForRss();
  }

  getIndexersForSearch(): IndexerConfig[] {
    return IndexerModel.findForAutomaticSearch();
  }

  /**
   * Latest releases from one indexer. Throws ExternalServiceError on any
   * transport or parse failure.
   */
  async fetchRss(indexer: IndexerConfig, limit: number): Promise<RawRelease[]> {
    return this.query(indexer, { t: 'search', limit }, 'RSS');
  }

  async search(indexer: IndexerConfig, query: string): Promise<RawRelease[]> {
    return this.query(indexer, { t: 'search', q: query }, `search "${query}"`);
  }

  private async query(indexer: IndexerConfig, params: Record<string, string | number>, label: string): Promise<RawRelease[]> {
    try {
      const response = await axios.get<string>(apiUrl(indexer), {
        params: {
          ...params,
          apikey: indexer.apiKey,
          ...(indexer.categories ? { cat: indexer.categories } : {})
        },
        responseType: 'text',
        timeout: REQUEST_TIMEOUT_MS
      });

      const releases = await parseFeed(response.data, indexer);
      logger.info(`[Indexer] ${indexer.name}: ${label} returned ${releases.length} releases`);
      return releases;
    } catch (error) {
      throw new ExternalServiceError('indexer', indexer.name, `${label} failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

export const indexerService = new IndexerService();
