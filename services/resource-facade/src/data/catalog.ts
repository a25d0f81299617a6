import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { EntitySchema, Row } from '../types/index.js';

const fieldTypeSchema = z.enum(['string', 'number', 'boolean', 'date']);

const entitySchemaSchema: z.ZodType<EntitySchema> = z.object({
  name: z.string().min(1),
  table: z.string().min(1),
  primaryKey: z.string().min(1),
  fields: z.record(fieldTypeSchema),
  relations: z
    .array(
      z.object({
        name: z.string().min(1),
        target: z.string().min(1),
        kind: z.enum(['hasMany', 'belongsTo']),
        foreignKey: z.string().min(1),
      })
    )
    .optional(),
});

const catalogSchema = z.object({
  entities: z.array(entitySchemaSchema),
  seed: z.record(z.array(z.record(z.unknown()))).default({}),
});

export interface Catalog {
  entities: EntitySchema[];
  /** Rows loaded into the in-process store when no database is configured */
  seed: Record<string, Row[]>;
}

export function resolveCatalogPath(configured: string): string {
  return path.isAbsolute(configured) ? configured : path.join(process.cwd(), configured);
}

/**
 * Read the entity catalog (schemas plus optional seed rows) from JSON.
 */
export async function loadCatalog(configuredPath: string): Promise<Catalog> {
  const catalogPath = resolveCatalogPath(configuredPath);
  const raw = await readFile(catalogPath, 'utf8');
  const result = catalogSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid catalog ${catalogPath}:\n  ${problems.join('\n  ')}`);
  }
  return result.data;
}
