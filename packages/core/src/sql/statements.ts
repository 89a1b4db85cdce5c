/**
 * Statement builders for generic table access
 *
 * Identifiers are quoted, values are always bound as $n parameters.
 * Callers validate table and column names against the catalog first.
 */

import type { Condition } from '../types/catalog.js';
import { ValidationError } from '../types/errors.js';
import { quoteIdentifier } from './identifiers.js';

export interface SqlStatement {
  text: string;
  values: unknown[];
}

/** System column used for ordering when a table has no user columns */
const FALLBACK_SORT_COLUMN = 'ctid';

/**
 * Pick the column used to order table pages: the first column ending in
 * `_id`, else the first column, else `ctid`.
 */
export function pickSortColumn(columns: readonly string[]): string {
  return columns.find((c) => c.endsWith('_id')) ?? columns[0] ?? FALLBACK_SORT_COLUMN;
}

/**
 * Render equality conditions joined with AND. A null value renders IS NULL.
 * Placeholders start after `offset` already-bound values.
 */
export function buildWhereClause(condition: Condition, offset = 0): SqlStatement {
  const parts: string[] = [];
  const values: unknown[] = [];
  for (const [column, value] of Object.entries(condition)) {
    if (value === null) {
      parts.push(`${quoteIdentifier(column)} IS NULL`);
      continue;
    }
    values.push(value);
    parts.push(`${quoteIdentifier(column)} = $${offset + values.length}`);
  }
  return { text: parts.join(' AND '), values };
}

export function buildCountQuery(table: string): SqlStatement {
  return { text: `SELECT COUNT(*) AS count FROM ${quoteIdentifier(table)}`, values: [] };
}

export function buildSelectPage(
  table: string,
  sortColumn: string,
  limit: number,
  offset: number
): SqlStatement {
  return {
    text: `SELECT * FROM ${quoteIdentifier(table)} ORDER BY ${quoteIdentifier(sortColumn)} LIMIT $1 OFFSET $2`,
    values: [limit, offset],
  };
}

export function buildSelectWhere(table: string, condition: Condition, limit?: number): SqlStatement {
  const where = buildWhereClause(condition);
  let text = `SELECT * FROM ${quoteIdentifier(table)}`;
  if (where.text) text += ` WHERE ${where.text}`;
  if (limit !== undefined) {
    where.values.push(limit);
    text += ` LIMIT $${where.values.length}`;
  }
  return { text, values: where.values };
}

export function buildInsert(table: string, data: Record<string, unknown>): SqlStatement {
  const columns = Object.keys(data);
  if (columns.length === 0) {
    throw new ValidationError('No data to insert');
  }
  const placeholders = columns.map((_, i) => `$${i + 1}`);
  return {
    text:
      `INSERT INTO ${quoteIdentifier(table)} (${columns.map(quoteIdentifier).join(', ')}) ` +
      `VALUES (${placeholders.join(', ')}) RETURNING *`,
    values: Object.values(data),
  };
}

export function buildUpdate(
  table: string,
  data: Record<string, unknown>,
  condition: Condition
): SqlStatement {
  const entries = Object.entries(data);
  if (entries.length === 0) {
    throw new ValidationError('No data to update');
  }
  if (Object.keys(condition).length === 0) {
    throw new ValidationError('No conditions specified for update');
  }
  const assignments = entries.map(([column], i) => `${quoteIdentifier(column)} = $${i + 1}`);
  const where = buildWhereClause(condition, entries.length);
  return {
    text: `UPDATE ${quoteIdentifier(table)} SET ${assignments.join(', ')} WHERE ${where.text} RETURNING *`,
    values: [...entries.map(([, value]) => value), ...where.values],
  };
}

export function buildDelete(table: string, condition: Condition): SqlStatement {
  if (Object.keys(condition).length === 0) {
    throw new ValidationError('No conditions specified for delete');
  }
  const where = buildWhereClause(condition);
  return {
    text: `DELETE FROM ${quoteIdentifier(table)} WHERE ${where.text} RETURNING *`,
    values: where.values,
  };
}

/**
 * Count rows of `referencing` whose foreign key points at a row of `table`
 * matching `condition`.
 */
export function buildReferencingCount(
  table: string,
  condition: Condition,
  referencing: { table: string; column: string; referencedColumn: string }
): SqlStatement {
  const where = buildWhereClause(condition);
  return {
    text:
      `SELECT COUNT(*) AS count FROM ${quoteIdentifier(referencing.table)} ` +
      `WHERE ${quoteIdentifier(referencing.column)} IN (` +
      `SELECT ${quoteIdentifier(referencing.referencedColumn)} FROM ${quoteIdentifier(table)} WHERE ${where.text})`,
    values: where.values,
  };
}

/**
 * Delete every row of `referencing` that points at any row of `table`.
 */
export function buildPurgeReferencing(
  table: string,
  referencing: { table: string; column: string; referencedColumn: string }
): SqlStatement {
  return {
    text:
      `DELETE FROM ${quoteIdentifier(referencing.table)} ` +
      `WHERE ${quoteIdentifier(referencing.column)} IN (` +
      `SELECT ${quoteIdentifier(referencing.referencedColumn)} FROM ${quoteIdentifier(table)})`,
    values: [],
  };
}

export function buildDeleteAll(table: string): SqlStatement {
  return { text: `DELETE FROM ${quoteIdentifier(table)}`, values: [] };
}
