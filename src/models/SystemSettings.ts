import db from '../config/database';

interface SettingRow {
  key: string;
  value: string;
}

export class SystemSettingsModel {
  static get(key: string): string | undefined {
    const row = db.prepare<[string], SettingRow>('SELECT key, value FROM system_settings WHERE key = ?').get(key);
    return row?.value;
  }

  static getAll(): Record<string, string> {
    const rows = db.prepare<[], SettingRow>('SELECT key, value FROM system_settings').all();
    const settings: Record<string, string> = {};
    for (const row of rows) {
      settings[row.key] = row.value;
    }
    return settings;
  }

  static set(key: string, value: string | number | boolean): void {
    db.prepare(`
      INSERT OR REPLACE INTO system_settings (key, value, updated_at)
      VALUES (?, ?, ?)
    `).run(key, String(value), new Date().toISOString());
  }

  static delete(key: string): void {
    db.prepare('DELETE FROM system_settings WHERE key = ?').run(key);
  }
}
