import { v4 as uuidv4 } from 'uuid';
import db from '../config/database';
import logger from '../config/logger';
import type { Protocol } from '../types/release';

export interface BlocklistEntry {
  id: string;
  event_id: string | null;
  title: string;
  indexer: string | null;
  protocol: Protocol;
  info_hash: string | null;
  reason: string | null;
  created_at: string;
}

export class BlocklistModel {
  static add(data: {
    event_id?: string;
    title: string;
    indexer?: string;
    protocol: Protocol;
    info_hash?: string;
    reason?: string;
  }): BlocklistEntry {
    const entry: BlocklistEntry = {
      id: uuidv4(),
      event_id: data.event_id || null,
      title: data.title,
      indexer: data.indexer || null,
      protocol: data.protocol,
      info_hash: data.info_hash ? data.info_hash.toLowerCase() : null,
      reason: data.reason || null,
      created_at: new Date().toISOString()
    };

    db.prepare(`
      INSERT INTO blocklist (id, event_id, title, indexer, protocol, info_hash, reason, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      entry.id,
      entry.event_id,
      entry.title,
      entry.indexer,
      entry.protocol,
      entry.info_hash,
      entry.reason,
      entry.created_at
    );

    logger.info(`[Blocklist] Added release: "${data.title}" - Reason: ${data.reason || 'download failed'}`);
    return entry;
  }

  static isBlockedByHash(infoHash: string): boolean {
    const row = db.prepare<[string], { id: string }>(
      'SELECT id FROM blocklist WHERE info_hash = ? LIMIT 1'
    ).get(infoHash.toLowerCase());
    return row !== undefined;
  }

  static isBlockedByTitle(title: string, indexer: string): boolean {
    const row = db.prepare<[string, string], { id: string }>(`
      SELECT id FROM blocklist
      WHERE LOWER(title) = LOWER(?) AND LOWER(COALESCE(indexer, '')) = LOWER(?)
      LIMIT 1
    `).get(title, indexer);
    return row !== undefined;
  }

  static findAll(): BlocklistEntry[] {
    return db.prepare<[], BlocklistEntry>('SELECT * FROM blocklist ORDER BY created_at DESC').all();
  }

  static remove(id: string): boolean {
    return db.prepare('DELETE FROM blocklist WHERE id = ?').run(id).changes > 0;
  }
}
