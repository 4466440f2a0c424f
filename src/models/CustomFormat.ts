import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import db from '../config/database';
import logger from '../config/logger';

const baseSpecification = {
  name: z.string().default(''),
  negate: z.boolean().default(false)
};

export const specificationSchema = z.discriminatedUnion('implementation', [
  z.object({
    ...baseSpecification,
    implementation: z.literal('ReleaseTitleSpecification'),
    pattern: z.string().min(1)
  }),
  z.object({
    ...baseSpecification,
    implementation: z.literal('ReleaseGroupSpecification'),
    pattern: z.string().min(1)
  }),
  z.object({
    ...baseSpecification,
    implementation: z.literal('SourceSpecification'),
    value: z.string().min(1)
  }),
  z.object({
    ...baseSpecification,
    implementation: z.literal('ResolutionSpecification'),
    value: z.string().min(1)
  }),
  z.object({
    ...baseSpecification,
    implementation: z.literal('SizeSpecification'),
    min: z.number().nonnegative().optional(),
    max: z.number().positive().optional()
  })
]);

export type Specification = z.infer<typeof specificationSchema>;
export type SpecificationInput = z.input<typeof specificationSchema>;
export type SpecificationType = Specification['implementation'];

const specificationListSchema = z.array(specificationSchema);

export interface CustomFormat {
  id: string;
  name: string;
  specifications: Specification[];
}

interface CustomFormatRow {
  id: string;
  name: string;
  specifications: string;
}

export class CustomFormatModel {
  /**
   * Throws a ZodError when a specification is malformed.
   */
  static create(data: { name: string; specifications: SpecificationInput[] }): CustomFormat {
    const id = uuidv4();
    const specifications = specificationListSchema.parse(data.specifications);

    db.prepare('INSERT INTO custom_formats (id, name, specifications) VALUES (?, ?, ?)').run(
      id,
      data.name,
      JSON.stringify(specifications)
    );

    return { id, name: data.name, specifications };
  }

  static findById(id: string): CustomFormat | undefined {
    const row = db.prepare<[string], CustomFormatRow>('SELECT id, name, specifications FROM custom_formats WHERE id = ?').get(id);
    return row ? this.mapRow(row) ?? undefined : undefined;
  }

  /**
   * Formats whose stored specifications fail validation are skipped.
   */
  static findAll(): CustomFormat[] {
    const rows = db.prepare<[], CustomFormatRow>('SELECT id, name, specifications FROM custom_formats ORDER BY name ASC').all();
    const formats: CustomFormat[] = [];
    for (const row of rows) {
      const format = this.mapRow(row);
      if (format) formats.push(format);
    }
    return formats;
  }

  private static mapRow(row: CustomFormatRow): CustomFormat | null {
    let json: unknown;
    try {
      json = JSON.parse(row.specifications);
    } catch (error) {
      logger.warn(`[CustomFormat] Skipping "${row.name}": specifications are not valid JSON`, error);
      return null;
    }

    const parsed = specificationListSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn(`[CustomFormat] Skipping "${row.name}": ${parsed.error.issues[0]?.message ?? 'invalid specification'}`);
      return null;
    }

    return { id: row.id, name: row.name, specifications: parsed.data };
  }
}
