/**
 * Read-only statement detection for the restricted query console
 */

import { maskSql, splitStatements } from './scanner.js';

const READ_ONLY_KEYWORDS = new Set(['select', 'with', 'explain', 'show', 'values', 'table']);

/**
 * Keywords that turn a read-only statement into a write. `into` covers
 * SELECT ... INTO, which creates a table.
 */
const WRITE_KEYWORDS = /\b(into|insert|update|delete|merge|truncate|drop|alter|create|grant|revoke|copy|call|do|vacuum|reindex|cluster|refresh|lock)\b/i;

export function firstKeyword(sql: string): string {
  const match = /^[\s(]*([A-Za-z]+)/.exec(maskSql(sql));
  return match?.[1]?.toLowerCase() ?? '';
}

/**
 * A single statement starting with a read-only keyword, with no writing
 * keyword anywhere outside literals and comments.
 */
export function isReadOnlyStatement(sql: string): boolean {
  const statements = splitStatements(sql);
  if (statements.length !== 1) return false;
  const [statement] = statements;
  if (statement === undefined) return false;
  if (!READ_ONLY_KEYWORDS.has(firstKeyword(statement))) return false;
  return !WRITE_KEYWORDS.test(maskSql(statement));
}
