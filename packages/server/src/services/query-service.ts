/**
 * Query Service
 *
 * Ad-hoc SQL for the query console. Database-side failures are returned
 * as an outcome with the SQLSTATE, not thrown; input problems (blank
 * query, missing named parameter, write statement in read-only mode)
 * throw ValidationError.
 */

import {
  ValidationError,
  bindNamedParams,
  getErrorCode,
  getErrorMessage,
  isReadOnlyStatement,
  normalizeRow,
  type Row,
} from '@pgdesk/core';
import { getAdapterSync } from '../db/adapters/index.js';
import type { DatabaseAdapter } from '../db/adapters/types.js';
import { getLog } from './log.js';

const log = getLog('QueryService');

export type QueryParameters = unknown[] | Record<string, unknown>;

export interface QueryRowsResult {
  success: true;
  kind: 'rows';
  data: Row[];
  columns: string[];
  rowCount: number;
  executionTimeMs: number;
}

export interface QueryCommandResult {
  success: true;
  kind: 'command';
  command: string;
  message: string;
  rowCount: number;
  executionTimeMs: number;
}

export interface QueryFailure {
  success: false;
  error: string;
  /** SQLSTATE reported by the server */
  code?: string;
  /** 1-based character offset of the error in the query text */
  position?: string;
  executionTimeMs: number;
}

export type QueryOutcome = QueryRowsResult | QueryCommandResult | QueryFailure;

export interface QueryServiceOptions {
  /** Accept only a single read-only statement */
  readOnly?: boolean;
}

function elapsedMs(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}

function errorPosition(error: unknown): string | undefined {
  if (error === null || typeof error !== 'object' || !('position' in error)) return undefined;
  return typeof error.position === 'string' ? error.position : undefined;
}

export class QueryService {
  private readonly readOnly: boolean;

  constructor(
    private readonly adapter?: DatabaseAdapter,
    options: QueryServiceOptions = {}
  ) {
    this.readOnly = options.readOnly ?? false;
  }

  isReadOnly(): boolean {
    return this.readOnly;
  }

  async executeSql(query: string, params?: QueryParameters): Promise<QueryOutcome> {
    const text = query.trim();
    if (!text) {
      throw new ValidationError('Query is required', { field: 'query' });
    }
    if (this.readOnly && !isReadOnlyStatement(text)) {
      throw new ValidationError(
        'Read-only mode: only a single SELECT, WITH, EXPLAIN, SHOW, VALUES or TABLE statement is allowed',
        { field: 'query' }
      );
    }

    let sql = text;
    let values: unknown[] | undefined;
    if (Array.isArray(params)) {
      values = params;
    } else if (params) {
      const bound = bindNamedParams(text, params);
      sql = bound.text;
      values = bound.values;
    }

    const db = this.adapter ?? getAdapterSync();
    const start = performance.now();
    try {
      const result = await db.run(sql, values);
      const executionTimeMs = elapsedMs(start);

      if (result.fields.length > 0) {
        log.debug(`Returned ${result.rows.length} rows in ${executionTimeMs}ms`);
        return {
          success: true,
          kind: 'rows',
          data: result.rows.map(normalizeRow),
          columns: result.fields,
          rowCount: result.rows.length,
          executionTimeMs,
        };
      }

      log.debug(`${result.command || 'Statement'} affected ${result.rowCount} rows in ${executionTimeMs}ms`);
      return {
        success: true,
        kind: 'command',
        command: result.command,
        message: `Query executed successfully. Rows affected: ${result.rowCount}`,
        rowCount: result.rowCount,
        executionTimeMs,
      };
    } catch (error) {
      const executionTimeMs = elapsedMs(start);
      const code = getErrorCode(error);
      const position = errorPosition(error);
      log.warn(`Query failed${code ? ` (${code})` : ''}: ${getErrorMessage(error)}`);
      return {
        success: false,
        error: getErrorMessage(error),
        ...(code ? { code } : {}),
        ...(position ? { position } : {}),
        executionTimeMs,
      };
    }
  }
}

/**
 * Query service bound to the global adapter, honoring QUERY_READ_ONLY.
 */
export function createQueryService(): QueryService {
  return new QueryService(undefined, { readOnly: process.env.QUERY_READ_ONLY === 'true' });
}
