/**
 * SQL helpers
 */

export { quoteIdentifier, qualifiedTablePattern } from './identifiers.js';
export { maskSql, splitStatements } from './scanner.js';
export { bindNamedParams, type BoundQuery } from './named-params.js';
export { firstKeyword, isReadOnlyStatement } from './read-only.js';
export {
  pickSortColumn,
  buildWhereClause,
  buildCountQuery,
  buildSelectPage,
  buildSelectWhere,
  buildInsert,
  buildUpdate,
  buildDelete,
  buildReferencingCount,
  buildPurgeReferencing,
  buildDeleteAll,
  type SqlStatement,
} from './statements.js';
export {
  isEmptyValue,
  compactValues,
  toJsonValue,
  normalizeRow,
  coerceValue,
  coerceRecordValues,
} from './values.js';
