import { v4 as uuidv4 } from 'uuid';
import db from '../config/database';

export interface League {
  id: string;
  name: string;
  sport: string;
  monitored_parts: string[];
}

export interface MonitoredEvent {
  id: string;
  title: string;
  sport: string;
  league_id: string | null;
  league_name: string | null;
  home_team: string | null;
  away_team: string | null;
  event_date: string | null;
  monitored: boolean;
  // Event-level list, or the league's when the event has none
  monitored_parts: string[];
  quality_profile_id: string | null;
}

export interface EventFile {
  id: string;
  event_id: string;
  part_name: string | null;
  file_path: string;
  quality: string | null;
  quality_score: number;
  custom_format_score: number;
  created_at: string;
}

interface LeagueRow {
  id: string;
  name: string;
  sport: string;
  monitored_parts: string | null;
}

interface EventRow {
  id: string;
  title: string;
  sport: string;
  league_id: string | null;
  league_name: string | null;
  league_monitored_parts: string | null;
  home_team: string | null;
  away_team: string | null;
  event_date: string | null;
  monitored: number;
  monitored_parts: string | null;
  quality_profile_id: string | null;
}

const EVENT_SELECT = `
  SELECT e.id, e.title, e.sport, e.league_id, l.name AS league_name, l.monitored_parts AS league_monitored_parts,
         e.home_team, e.away_team, e.event_date, e.monitored, e.monitored_parts, e.quality_profile_id
  FROM events e
  LEFT JOIN leagues l ON l.id = e.league_id
`;

export function parsePartList(value: string | null): string[] {
  if (!value) return [];
  return value.split(',').map(part => part.trim()).filter(part => part.length > 0);
}

export class LeagueModel {
  static create(data: { name: string; sport: string; monitored_parts?: string[] }): League {
    const id = uuidv4();
    db.prepare('INSERT INTO leagues (id, name, sport, monitored_parts) VALUES (?, ?, ?, ?)').run(
      id,
      data.name,
      data.sport,
      data.monitored_parts && data.monitored_parts.length > 0 ? data.monitored_parts.join(',') : null
    );
    return {
      id,
      name: data.name,
      sport: data.sport,
      monitored_parts: data.monitored_parts ?? []
    };
  }

  static findById(id: string): League | undefined {
    const row = db.prepare<[string], LeagueRow>('SELECT id, name, sport, monitored_parts FROM leagues WHERE id = ?').get(id);
    if (!row) return undefined;
    return { ...row, monitored_parts: parsePartList(row.monitored_parts) };
  }
}

export class EventModel {
  static create(data: {
    title: string;
    sport: string;
    league_id?: string;
    home_team?: string;
    away_team?: string;
    event_date?: string;
    monitored?: boolean;
    monitored_parts?: string[];
    quality_profile_id?: string;
  }): MonitoredEvent {
    const id = uuidv4();

    db.prepare(`
      INSERT INTO events (id, title, sport, league_id, home_team, away_team, event_date, monitored, monitored_parts, quality_profile_id)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      data.title,
      data.sport,
      data.league_id || null,
      data.home_team || null,
      data.away_team || null,
      data.event_date || null,
      data.monitored === false ? 0 : 1,
      data.monitored_parts && data.monitored_parts.length > 0 ? data.monitored_parts.join(',') : null,
      data.quality_profile_id || null
    );

    const created = this.findById(id);
    if (!created) {
      throw new Error(`Event ${id} was not persisted`);
    }
    return created;
  }

  static findById(id: string): MonitoredEvent | undefined {
    const row = db.prepare<[string], EventRow>(`${EVENT_SELECT} WHERE e.id = ?`).get(id);
    return row ? this.mapRow(row) : undefined;
  }

  static findMonitored(): MonitoredEvent[] {
    const rows = db.prepare<[], EventRow>(`${EVENT_SELECT} WHERE e.monitored = 1`).all();
    return rows.map(row => this.mapRow(row));
  }

  static setMonitoredParts(id: string, parts: string[]): void {
    db.prepare('UPDATE events SET monitored_parts = ? WHERE id = ?').run(parts.length > 0 ? parts.join(',') : null, id);
  }

  private static mapRow(row: EventRow): MonitoredEvent {
    const eventParts = parsePartList(row.monitored_parts);
    return {
      id: row.id,
      title: row.title,
      sport: row.sport,
      league_id: row.league_id,
      league_name: row.league_name,
      home_team: row.home_team,
      away_team: row.away_team,
      event_date: row.event_date,
      monitored: row.monitored === 1,
      monitored_parts: eventParts.length > 0 ? eventParts : parsePartList(row.league_monitored_parts),
      quality_profile_id: row.quality_profile_id
    };
  }
}

export class EventFileModel {
  static create(data: {
    event_id: string;
    part_name?: string | null;
    file_path: string;
    quality?: string;
    quality_score: number;
    custom_format_score: number;
  }): EventFile {
    const id = uuidv4();
    const createdAt = new Date().toISOString();

    db.prepare(`
      INSERT INTO event_files (id, event_id, part_name, file_path, quality, quality_score, custom_format_score, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      data.event_id,
      data.part_name ?? null,
      data.file_path,
      data.quality || null,
      data.quality_score,
      data.custom_format_score,
      createdAt
    );

    return {
      id,
      event_id: data.event_id,
      part_name: data.part_name ?? null,
      file_path: data.file_path,
      quality: data.quality || null,
      quality_score: data.quality_score,
      custom_format_score: data.custom_format_score,
      created_at: createdAt
    };
  }

  static findByEvent(eventId: string): EventFile[] {
    return db.prepare<[string], EventFile>('SELECT * FROM event_files WHERE event_id = ? ORDER BY created_at ASC').all(eventId);
  }

  /**
   * Best file for an (event, part) pair. A null part means the full event.
   */
  static findForPart(eventId: string, partName: string | null): EventFile | undefined {
    return db.prepare<[string, string | null], EventFile>(`
      SELECT * FROM event_files
      WHERE event_id = ? AND part_name IS ?
      ORDER BY (quality_score + custom_format_score) DESC
      LIMIT 1
    `).get(eventId, partName);
  }
}

export function storedTotalScore(row: { quality_score: number; custom_format_score: number }): number {
  return row.quality_score + row.custom_format_score;
}
