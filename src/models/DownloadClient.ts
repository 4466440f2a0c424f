import { v4 as uuidv4 } from 'uuid';
import db from '../config/database';
import type { Protocol } from '../types/release';

export type DownloadClientType = 'qbittorrent' | 'sabnzbd';

export interface DownloadClient {
  id: string;
  name: string;
  type: DownloadClientType;
  enabled: boolean;
  host: string;
  port: number;
  use_ssl: boolean;
  url_base: string | null;
  username: string | null;
  password: string | null;
  api_key: string | null;
  category: string | null;
  priority: number;
}

interface DownloadClientRow {
  id: string;
  name: string;
  type: DownloadClientType;
  enabled: number;
  host: string;
  port: number;
  use_ssl: number;
  url_base: string | null;
  username: string | null;
  password: string | null;
  api_key: string | null;
  category: string | null;
  priority: number;
}

export function clientTypeForProtocol(protocol: Protocol): DownloadClientType {
  switch (protocol) {
    case 'torrent':
      return 'qbittorrent';
    case 'usenet':
      return 'sabnzbd';
  }
}

export class DownloadClientModel {
  static create(data: {
    name: string;
    type: DownloadClientType;
    enabled?: boolean;
    host: string;
    port: number;
    use_ssl?: boolean;
    url_base?: string;
    username?: string;
    password?: string;
    api_key?: string;
    category?: string;
    priority?: number;
  }): DownloadClient {
    const id = uuidv4();

    db.prepare(`
      INSERT INTO download_clients (
        id, name, type, enabled, host, port, use_ssl, url_base,
        username, password, api_key, category, priority
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      data.name,
      data.type,
      data.enabled === false ? 0 : 1,
      data.host,
      data.port,
      data.use_ssl ? 1 : 0,
      data.url_base || null,
      data.username || null,
      data.password || null,
      data.api_key || null,
      data.category || null,
      data.priority ?? 1
    );

    const created = this.findById(id);
    if (!created) {
      throw new Error(`Download client ${id} was not persisted`);
    }
    return created;
  }

  static findById(id: string): DownloadClient | undefined {
    const row = db.prepare<[string], DownloadClientRow>('SELECT * FROM download_clients WHERE id = ?').get(id);
    return row ? this.mapRow(row) : undefined;
  }

  static findEnabled(): DownloadClient[] {
    const rows = db.prepare<[], DownloadClientRow>(
      'SELECT * FROM download_clients WHERE enabled = 1 ORDER BY priority ASC, name ASC'
    ).all();
    return rows.map(row => this.mapRow(row));
  }

  /**
   * Enabled client able to take the protocol, lowest priority number first.
   */
  static findForProtocol(protocol: Protocol): DownloadClient | undefined {
    const type = clientTypeForProtocol(protocol);
    return this.findEnabled().find(client => client.type === type);
  }

  private static mapRow(row: DownloadClientRow): DownloadClient {
    return {
      ...row,
      enabled: row.enabled === 1,
      use_ssl: row.use_ssl === 1
    };
  }
}
