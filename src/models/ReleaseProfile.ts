import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import db from '../config/database';
import logger from '../config/logger';

export interface PreferredTerm {
  term: string;
  score: number;
}

export interface ReleaseProfile {
  id: string;
  name: string;
  enabled: boolean;
  required: string[];
  ignored: string[];
  preferred: PreferredTerm[];
  // Empty means every indexer
  indexer_ids: string[];
}

interface ReleaseProfileRow {
  id: string;
  name: string;
  enabled: number;
  required: string;
  ignored: string;
  preferred: string;
  indexer_ids: string;
}

const preferredSchema = z.array(z.object({ term: z.string().min(1), score: z.number().int() }));
const indexerIdsSchema = z.array(z.string());

export function splitTerms(value: string): string[] {
  return value.split(',').map(term => term.trim()).filter(term => term.length > 0);
}

function parseJsonColumn<T>(profileName: string, column: string, raw: string, schema: z.ZodType<T>): T | null {
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    if (parsed.success) return parsed.data;
  } catch (error) {
    logger.debug(`[ReleaseProfile] JSON parse failure for ${profileName}.${column}`, error);
  }
  logger.warn(`[ReleaseProfile] Profile "${profileName}" has an invalid ${column} column, ignoring it`);
  return null;
}

export class ReleaseProfileModel {
  static create(data: {
    name: string;
    enabled?: boolean;
    required?: string[];
    ignored?: string[];
    preferred?: PreferredTerm[];
    indexer_ids?: string[];
  }): ReleaseProfile {
    const id = uuidv4();
    const profile: ReleaseProfile = {
      id,
      name: data.name,
      enabled: data.enabled !== false,
      required: data.required ?? [],
      ignored: data.ignored ?? [],
      preferred: preferredSchema.parse(data.preferred ?? []),
      indexer_ids: data.indexer_ids ?? []
    };

    db.prepare(`
      INSERT INTO release_profiles (id, name, enabled, required, ignored, preferred, indexer_ids)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `).run(
      id,
      profile.name,
      profile.enabled ? 1 : 0,
      profile.required.join(','),
      profile.ignored.join(','),
      JSON.stringify(profile.preferred),
      JSON.stringify(profile.indexer_ids)
    );

    return profile;
  }

  static findAll(): ReleaseProfile[] {
    const rows = db.prepare<[], ReleaseProfileRow>('SELECT * FROM release_profiles ORDER BY name ASC').all();
    return rows.map(row => this.mapRow(row));
  }

  static findEnabled(): ReleaseProfile[] {
    return this.findAll().filter(profile => profile.enabled);
  }

  private static mapRow(row: ReleaseProfileRow): ReleaseProfile {
    return {
      id: row.id,
      name: row.name,
      enabled: row.enabled === 1,
      required: splitTerms(row.required),
      ignored: splitTerms(row.ignored),
      preferred: parseJsonColumn(row.name, 'preferred', row.preferred, preferredSchema) ?? [],
      indexer_ids: parseJsonColumn(row.name, 'indexer_ids', row.indexer_ids, indexerIdsSchema) ?? []
    };
  }
}
