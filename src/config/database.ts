import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';

const dbPath = process.env.DATABASE_PATH || path.join(process.cwd(), 'data', 'ringside.db');

if (dbPath !== ':memory:') {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
}

const db = new Database(dbPath);

db.pragma('journal_mode = WAL');
db.pragma('foreign_keys = ON');

export function initializeDatabase(): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS system_settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS quality_profiles (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      items TEXT NOT NULL DEFAULT '[]',
      min_custom_format_score INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS custom_formats (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      specifications TEXT NOT NULL DEFAULT '[]',
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS quality_profile_custom_formats (
      profile_id TEXT NOT NULL REFERENCES quality_profiles(id) ON DELETE CASCADE,
      custom_format_id TEXT NOT NULL REFERENCES custom_formats(id) ON DELETE CASCADE,
      score INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (profile_id, custom_format_id)
    );

    CREATE TABLE IF NOT EXISTS release_profiles (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      enabled INTEGER NOT NULL DEFAULT 1,
      required TEXT NOT NULL DEFAULT '',
      ignored TEXT NOT NULL DEFAULT '',
      preferred TEXT NOT NULL DEFAULT '[]',
      indexer_ids TEXT NOT NULL DEFAULT '[]',
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS leagues (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      sport TEXT NOT NULL,
      monitored_parts TEXT,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS events (
      id TEXT PRIMARY KEY,
      title TEXT NOT NULL,
      sport TEXT NOT NULL,
      league_id TEXT REFERENCES leagues(id) ON DELETE SET NULL,
      home_team TEXT,
      away_team TEXT,
      event_date TEXT,
      monitored INTEGER NOT NULL DEFAULT 1,
      monitored_parts TEXT,
      quality_profile_id TEXT REFERENCES quality_profiles(id) ON DELETE SET NULL,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS event_files (
      id TEXT PRIMARY KEY,
      event_id TEXT NOT NULL REFERENCES events(id) ON DELETE CASCADE,
      part_name TEXT,
      file_path TEXT NOT NULL,
      quality TEXT,
      quality_score INTEGER NOT NULL DEFAULT 0,
      custom_format_score INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS indexers (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      type TEXT NOT NULL CHECK (type IN ('torznab', 'newznab')),
      url TEXT NOT NULL,
      api_key TEXT NOT NULL,
      categories TEXT,
      enabled INTEGER NOT NULL DEFAULT 1,
      enable_rss INTEGER NOT NULL DEFAULT 1,
      enable_automatic_search INTEGER NOT NULL DEFAULT 1,
      priority INTEGER NOT NULL DEFAULT 25,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS download_clients (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      type TEXT NOT NULL CHECK (type IN ('qbittorrent', 'sabnzbd')),
      enabled INTEGER NOT NULL DEFAULT 1,
      host TEXT NOT NULL,
      port INTEGER NOT NULL,
      use_ssl INTEGER NOT NULL DEFAULT 0,
      url_base TEXT,
      username TEXT,
      password TEXT,
      api_key TEXT,
      category TEXT,
      priority INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE TABLE IF NOT EXISTS download_queue (
      id TEXT PRIMARY KEY,
      event_id TEXT NOT NULL REFERENCES events(id) ON DELETE CASCADE,
      part_name TEXT,
      title TEXT NOT NULL,
      download_client_id TEXT,
      download_id TEXT,
      status TEXT NOT NULL,
      progress REAL NOT NULL DEFAULT 0,
      retry_count INTEGER NOT NULL DEFAULT 0,
      quality TEXT,
      quality_score INTEGER NOT NULL DEFAULT 0,
      custom_format_score INTEGER NOT NULL DEFAULT 0,
      indexer TEXT,
      protocol TEXT NOT NULL,
      info_hash TEXT,
      size INTEGER NOT NULL DEFAULT 0,
      error_message TEXT,
      added_at TEXT NOT NULL,
      last_update TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_download_queue_event ON download_queue(event_id, part_name);

    CREATE TABLE IF NOT EXISTS grab_history (
      id TEXT PRIMARY KEY,
      event_id TEXT NOT NULL REFERENCES events(id) ON DELETE CASCADE,
      part_name TEXT,
      title TEXT NOT NULL,
      indexer TEXT,
      protocol TEXT NOT NULL,
      quality TEXT,
      quality_score INTEGER NOT NULL DEFAULT 0,
      custom_format_score INTEGER NOT NULL DEFAULT 0,
      download_client_id TEXT,
      download_id TEXT,
      superseded INTEGER NOT NULL DEFAULT 0,
      grabbed_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_grab_history_event ON grab_history(event_id, part_name);

    CREATE TABLE IF NOT EXISTS blocklist (
      id TEXT PRIMARY KEY,
      event_id TEXT,
      title TEXT NOT NULL,
      indexer TEXT,
      protocol TEXT NOT NULL,
      info_hash TEXT,
      reason TEXT,
      created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
    );

    CREATE INDEX IF NOT EXISTS idx_blocklist_hash ON blocklist(info_hash);
  `);
}

export default db;
