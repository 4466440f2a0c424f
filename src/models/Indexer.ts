import { v4 as uuidv4 } from 'uuid';
import db from '../config/database';

export type IndexerType = 'torznab' | 'newznab';

export interface IndexerConfig {
  id: string;
  name: string;
  type: IndexerType;
  url: string;
  apiKey: string;
  categories: string | null;
  enabled: boolean;
  enableRss: boolean;
  enableAutomaticSearch: boolean;
  priority: number;
}

interface IndexerRow {
  id: string;
  name: string;
  type: IndexerType;
  url: string;
  api_key: string;
  categories: string | null;
  enabled: number;
  enable_rss: number;
  enable_automatic_search: number;
  priority: number;
}

export class IndexerModel {
  static create(data: {
    name: string;
    type: IndexerType;
    url: string;
    apiKey: string;
    categories?: string;
    enabled?: boolean;
    enableRss?: boolean;
    enableAutomaticSearch?: boolean;
    priority?: number;
  }): IndexerConfig {
    const id = uuidv4();
    const indexer: IndexerConfig = {
      id,
      name: data.name,
      type: data.type,
      url: data.url,
      apiKey: data.apiKey,
      categories: data.categories || null,
      enabled: data.enabled !== false,
      enableRss: data.enableRss !== false,
      enableAutomaticSearch: data.enableAutomaticSearch !== false,
      priority: data.priority ?? 25
    };

    db.prepare(`
      INSERT INTO indexers (id, name, type, url, api_key, categories, enabled, enable_rss, enable_automatic_search, priority)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      indexer.name,
      indexer.type,
      indexer.url,
      indexer.apiKey,
      indexer.categories,
      indexer.enabled ? 1 : 0,
      indexer.enableRss ? 1 : 0,
      indexer.enableAutomaticSearch ? 1 : 0,
      indexer.priority
    );

    return indexer;
  }

  static findAll(): IndexerConfig[] {
    const rows = db.prepare<[], IndexerRow>('SELECT * FROM indexers ORDER BY priority ASC, name ASC').all();
    return rows.map(row => this.mapRow(row));
  }

  static findForRss(): IndexerConfig[] {
    return this.findAll().filter(indexer => indexer.enabled && indexer.enableRss);
  }

  static findForAutomaticSearch(): IndexerConfig[] {
    return this.findAll().filter(indexer => indexer.enabled && indexer.enableAutomaticSearch);
  }

  private static mapRow(row: IndexerRow): IndexerConfig {
    return {
      id: row.id,
      name: row.name,
      type: row.type,
      url: row.url,
      apiKey: row.api_key,
      categories: row.categories,
      enabled: row.enabled === 1,
      enableRss: row.enable_rss === 1,
      enableAutomaticSearch: row.enable_automatic_search === 1,
      priority: row.priority
    };
  }
}
