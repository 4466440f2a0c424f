import { v4 as uuidv4 } from 'uuid';
import db from '../config/database';
import type { Protocol } from '../types/release';

export interface GrabHistoryEntry {
  id: string;
  event_id: string;
  part_name: string | null;
  title: string;
  indexer: string | null;
  protocol: Protocol;
  quality: string | null;
  quality_score: number;
  custom_format_score: number;
  download_client_id: string | null;
  download_id: string | null;
  superseded: boolean;
  grabbed_at: string;
}

interface GrabHistoryRow extends Omit<GrabHistoryEntry, 'superseded'> {
  superseded: number;
}

export class GrabHistoryModel {
  static create(data: Omit<GrabHistoryEntry, 'id' | 'superseded' | 'grabbed_at'>): GrabHistoryEntry {
    const entry: GrabHistoryEntry = {
      ...data,
      id: uuidv4(),
      superseded: false,
      grabbed_at: new Date().toISOString()
    };

    db.prepare(`
      INSERT INTO grab_history (
        id, event_id, part_name, title, indexer, protocol, quality, quality_score, custom_format_score,
        download_client_id, download_id, superseded, grabbed_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, 0, ?)
    `).run(
      entry.id,
      entry.event_id,
      entry.part_name,
      entry.title,
      entry.indexer,
      entry.protocol,
      entry.quality,
      entry.quality_score,
      entry.custom_format_score,
      entry.download_client_id,
      entry.download_id,
      entry.grabbed_at
    );

    return entry;
  }

  /**
   * Marks every live entry for the pair as superseded. Returns the count.
   */
  static supersede(eventId: string, partName: string | null): number {
    const result = db.prepare(`
      UPDATE grab_history SET superseded = 1
      WHERE event_id = ? AND part_name IS ? AND superseded = 0
    `).run(eventId, partName);
    return result.changes;
  }

  static findByEvent(eventId: string): GrabHistoryEntry[] {
    const rows = db.prepare<[string], GrabHistoryRow>(
      'SELECT * FROM grab_history WHERE event_id = ? ORDER BY grabbed_at ASC, rowid ASC'
    ).all(eventId);
    return rows.map(row => this.mapRow(row));
  }

  static findRecent(limit: number = 100): GrabHistoryEntry[] {
    const rows = db.prepare<[number], GrabHistoryRow>(
      'SELECT * FROM grab_history ORDER BY grabbed_at DESC, rowid DESC LIMIT ?'
    ).all(limit);
    return rows.map(row => this.mapRow(row));
  }

  private static mapRow(row: GrabHistoryRow): GrabHistoryEntry {
    return { ...row, superseded: row.superseded === 1 };
  }
}
