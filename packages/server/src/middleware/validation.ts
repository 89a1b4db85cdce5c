/**
 * Request validation middleware using Zod
 *
 * Shape checks for console request bodies. Table and column names are
 * checked against the catalog by the services, not here.
 */

import { z } from 'zod';

const MAX_IDENTIFIER_LENGTH = 63;

const identifier = z.string().min(1).max(MAX_IDENTIFIER_LENGTH);
const columnValues = z.record(identifier, z.unknown());

// ─── Record Schemas ──────────────────────────────────────────────

export const recordValuesSchema = columnValues;

export const updateWhereSchema = z.object({
  set: columnValues,
  where: columnValues,
});

export const deleteWhereSchema = z.object({
  where: columnValues,
  force: z.boolean().optional(),
});

// ─── Query Schemas ───────────────────────────────────────────────

export const executeQuerySchema = z.object({
  query: z.string().min(1).max(1_000_000),
  params: z.union([z.array(z.unknown()), z.record(z.string(), z.unknown())]).optional(),
});

// ─── Maintenance Schemas ─────────────────────────────────────────

export const createBackupSchema = z.object({
  name: z.string().max(255).optional(),
  tables: z.array(identifier).max(1000).optional(),
});

export const restoreBackupSchema = z.object({
  fileName: z.string().min(1).max(255),
});

export const archiveTablesSchema = z.object({
  tables: z.array(identifier).min(1).max(1000),
  reason: z.string().max(2000),
  purgeDependents: z.boolean().optional(),
});

// ─── Validation Helper ──────────────────────────────────────────

/**
 * Validate request body against a Zod schema.
 * Returns parsed data on success, throws descriptive error on failure.
 */
export function validateBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Validation failed: ${issues}`);
  }
  return result.data;
}
