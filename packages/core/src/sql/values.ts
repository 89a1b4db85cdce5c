/**
 * Value normalization and coercion
 *
 * Rows leave the console as JSON; input values arrive as JSON scalars or
 * form-style strings and are coerced by the target column's data type.
 */

import type { ColumnInfo, Row } from '../types/catalog.js';

/**
 * Values treated as "not provided" in insert and update payloads.
 */
export function isEmptyValue(value: unknown): boolean {
  return value === '' || value === null || value === undefined;
}

/**
 * Drop empty entries, and optionally named columns, from a payload.
 */
export function compactValues(
  data: Record<string, unknown>,
  exclude: readonly string[] = []
): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    if (isEmptyValue(value) || exclude.includes(key)) continue;
    result[key] = value;
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert a driver value into something JSON.stringify keeps intact.
 */
export function toJsonValue(value: unknown): unknown {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value === 'bigint') return value.toString();
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value);
  if (value instanceof Uint8Array) return `\\x${Buffer.from(value).toString('hex')}`;
  if (Array.isArray(value)) return value.map(toJsonValue);
  if (isPlainObject(value)) return normalizeRow(value);
  return value;
}

export function normalizeRow(row: Row): Row {
  const result: Row = {};
  for (const [key, value] of Object.entries(row)) {
    result[key] = toJsonValue(value);
  }
  return result;
}

const INTEGER_TYPES = new Set(['smallint', 'integer']);
const FLOAT_TYPES = new Set(['real', 'double precision']);
const INTEGER_TEXT = /^-?\d+$/;
const DECIMAL_TEXT = /^-?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;
const TRUE_TEXT = new Set(['on', 'true', '1', 'yes', 't']);
const FALSE_TEXT = new Set(['off', 'false', '0', 'no', 'f']);

/**
 * Coerce a single string input by column data type. Non-string values and
 * text that does not parse are returned unchanged for the server to judge.
 */
export function coerceValue(type: string, value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const text = value.trim();

  if (INTEGER_TYPES.has(type)) {
    return INTEGER_TEXT.test(text) ? Number.parseInt(text, 10) : value;
  }
  if (type === 'bigint' || type === 'numeric') {
    // Kept as text so precision survives; pg casts it server-side
    return INTEGER_TEXT.test(text) || DECIMAL_TEXT.test(text) ? text : value;
  }
  if (FLOAT_TYPES.has(type)) {
    return DECIMAL_TEXT.test(text) ? Number.parseFloat(text) : value;
  }
  if (type === 'boolean') {
    const lowered = text.toLowerCase();
    if (TRUE_TEXT.has(lowered)) return true;
    if (FALSE_TEXT.has(lowered)) return false;
  }
  return value;
}

/**
 * Coerce every entry whose key names a known column.
 */
export function coerceRecordValues(
  columns: readonly ColumnInfo[],
  data: Record<string, unknown>
): Record<string, unknown> {
  const types = new Map(columns.map((c) => [c.name, c.type]));
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(data)) {
    const type = types.get(key);
    result[key] = type === undefined ? value : coerceValue(type, value);
  }
  return result;
}
