import { v4 as uuidv4 } from 'uuid';
import db from '../config/database';
import type { Protocol } from '../types/release';

export type DownloadStatus =
  | 'queued'
  | 'downloading'
  | 'completed'
  | 'importing'
  | 'imported'
  | 'failed'
  | 'cancelled';

export const ACTIVE_STATUSES: readonly DownloadStatus[] = ['queued', 'downloading'];
export const IMPORT_STATUSES: readonly DownloadStatus[] = ['completed', 'importing'];

export interface QueueItem {
  id: string;
  event_id: string;
  part_name: string | null;
  title: string;
  download_client_id: string | null;
  download_id: string | null;
  status: DownloadStatus;
  progress: number;
  retry_count: number;
  quality: string | null;
  quality_score: number;
  custom_format_score: number;
  indexer: string | null;
  protocol: Protocol;
  info_hash: string | null;
  size: number;
  error_message: string | null;
  added_at: string;
  last_update: string;
}

export interface CreateQueueItem {
  event_id: string;
  part_name: string | null;
  title: string;
  download_client_id?: string | null;
  download_id?: string | null;
  status: DownloadStatus;
  retry_count?: number;
  quality?: string | null;
  quality_score: number;
  custom_format_score: number;
  indexer?: string | null;
  protocol: Protocol;
  info_hash?: string | null;
  size?: number;
  error_message?: string | null;
  last_update?: string;
}

function statusList(statuses: readonly DownloadStatus[]): string {
  return statuses.map(status => `'${status}'`).join(', ');
}

export class DownloadModel {
  static create(data: CreateQueueItem): QueueItem {
    const id = uuidv4();
    const now = data.last_update ?? new Date().toISOString();

    db.prepare(`
      INSERT INTO download_queue (
        id, event_id, part_name, title, download_client_id, download_id, status, progress, retry_count,
        quality, quality_score, custom_format_score, indexer, protocol, info_hash, size, error_message,
        added_at, last_update
      ) VALUES (?, ?, ?, ?, ?, ?, ?, 0, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      data.event_id,
      data.part_name,
      data.title,
      data.download_client_id ?? null,
      data.download_id ?? null,
      data.status,
      data.retry_count ?? 0,
      data.quality ?? null,
      data.quality_score,
      data.custom_format_score,
      data.indexer ?? null,
      data.protocol,
      data.info_hash ?? null,
      data.size ?? 0,
      data.error_message ?? null,
      now,
      now
    );

    const created = this.findById(id);
    if (!created) {
      throw new Error(`Queue item ${id} was not persisted`);
    }
    return created;
  }

  static findById(id: string): QueueItem | undefined {
    return db.prepare<[string], QueueItem>('SELECT * FROM download_queue WHERE id = ?').get(id);
  }

  static findAll(status?: DownloadStatus): QueueItem[] {
    if (status) {
      return db.prepare<[DownloadStatus], QueueItem>(
        'SELECT * FROM download_queue WHERE status = ? ORDER BY added_at DESC'
      ).all(status);
    }
    return db.prepare<[], QueueItem>('SELECT * FROM download_queue ORDER BY added_at DESC').all();
  }

  static findByEvent(eventId: string): QueueItem[] {
    return db.prepare<[string], QueueItem>(
      'SELECT * FROM download_queue WHERE event_id = ? ORDER BY added_at ASC'
    ).all(eventId);
  }

  /**
   * The queued or downloading item for an (event, part) pair, if any.
   */
  static findActive(eventId: string, partName: string | null): QueueItem | undefined {
    return db.prepare<[string, string | null], QueueItem>(`
      SELECT * FROM download_queue
      WHERE event_id = ? AND part_name IS ? AND status IN (${statusList(ACTIVE_STATUSES)})
      ORDER BY last_update DESC
      LIMIT 1
    `).get(eventId, partName);
  }

  static findImporting(eventId: string, partName: string | null): QueueItem | undefined {
    return db.prepare<[string, string | null], QueueItem>(`
      SELECT * FROM download_queue
      WHERE event_id = ? AND part_name IS ? AND status IN (${statusList(IMPORT_STATUSES)})
      LIMIT 1
    `).get(eventId, partName);
  }

  static findLatestAttempt(eventId: string, partName: string | null): QueueItem | undefined {
    return db.prepare<[string, string | null], QueueItem>(`
      SELECT * FROM download_queue
      WHERE event_id = ? AND part_name IS ?
      ORDER BY last_update DESC, rowid DESC
      LIMIT 1
    `).get(eventId, partName);
  }

  static updateStatus(id: string, status: DownloadStatus, errorMessage?: string): void {
    db.prepare(`
      UPDATE download_queue SET status = ?, error_message = ?, last_update = ? WHERE id = ?
    `).run(status, errorMessage ?? null, new Date().toISOString(), id);
  }

  static delete(id: string): void {
    db.prepare('DELETE FROM download_queue WHERE id = ?').run(id);
  }
}
