import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import db from '../config/database';
import logger from '../config/logger';

export interface QualityItem {
  quality: string;
  allowed: boolean;
}

export interface QualityProfile {
  id: string;
  name: string;
  items: QualityItem[];
  min_custom_format_score: number;
  // custom format id -> score
  format_scores: Record<string, number>;
}

interface QualityProfileRow {
  id: string;
  name: string;
  items: string;
  min_custom_format_score: number;
}

interface FormatScoreRow {
  custom_format_id: string;
  score: number;
}

const qualityItemsSchema = z.array(z.object({
  quality: z.string().min(1),
  allowed: z.boolean()
}));

function parseItems(profile: QualityProfileRow): QualityItem[] {
  try {
    const parsed = qualityItemsSchema.safeParse(JSON.parse(profile.items));
    if (parsed.success) {
      return parsed.data;
    }
    logger.warn(`[QualityProfile] Profile "${profile.name}" has invalid quality items, ignoring them`);
  } catch (error) {
    logger.warn(`[QualityProfile] Profile "${profile.name}" quality items are not valid JSON`, error);
  }
  return [];
}

export class QualityProfileModel {
  static create(data: {
    name: string;
    items: QualityItem[];
    min_custom_format_score?: number;
    format_scores?: Record<string, number>;
  }): QualityProfile {
    const id = uuidv4();
    const items = qualityItemsSchema.parse(data.items);

    const insert = db.transaction(() => {
      db.prepare(`
        INSERT INTO quality_profiles (id, name, items, min_custom_format_score)
        VALUES (?, ?, ?, ?)
      `).run(id, data.name, JSON.stringify(items), data.min_custom_format_score ?? 0);

      for (const [formatId, score] of Object.entries(data.format_scores ?? {})) {
        this.setFormatScore(id, formatId, score);
      }
    });
    insert();

    const created = this.findById(id);
    if (!created) {
      throw new Error(`Quality profile ${id} was not persisted`);
    }
    return created;
  }

  static findById(id: string): QualityProfile | undefined {
    const row = db.prepare<[string], QualityProfileRow>(
      'SELECT id, name, items, min_custom_format_score FROM quality_profiles WHERE id = ?'
    ).get(id);
    return row ? this.mapRow(row) : undefined;
  }

  static findAll(): QualityProfile[] {
    const rows = db.prepare<[], QualityProfileRow>(
      'SELECT id, name, items, min_custom_format_score FROM quality_profiles ORDER BY name ASC'
    ).all();
    return rows.map(row => this.mapRow(row));
  }

  static setFormatScore(profileId: string, customFormatId: string, score: number): void {
    db.prepare(`
      INSERT OR REPLACE INTO quality_profile_custom_formats (profile_id, custom_format_id, score)
      VALUES (?, ?, ?)
    `).run(profileId, customFormatId, score);
  }

  private static mapRow(row: QualityProfileRow): QualityProfile {
    const scores = db.prepare<[string], FormatScoreRow>(
      'SELECT custom_format_id, score FROM quality_profile_custom_formats WHERE profile_id = ?'
    ).all(row.id);

    const formatScores: Record<string, number> = {};
    for (const score of scores) {
      formatScores[score.custom_format_id] = score.score;
    }

    return {
      id: row.id,
      name: row.name,
      items: parseItems(row),
      min_custom_format_score: row.min_custom_format_score,
      format_scores: formatScores
    };
  }
}
