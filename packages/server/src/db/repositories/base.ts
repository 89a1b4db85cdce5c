/**
 * Base Repository Class for PostgreSQL
 *
 * Repositories take an adapter explicitly or fall back to the global one.
 */

import { getAdapterSync } from '../adapters/index.js';
import type { DatabaseAdapter, QueryExecutor, QueryParams, Row } from '../adapters/types.js';

/**
 * Base class for all PostgreSQL repositories
 * Provides common database access methods
 */
export abstract class BaseRepository {
  protected adapter: DatabaseAdapter | null;

  constructor(adapter?: DatabaseAdapter) {
    this.adapter = adapter ?? null;
  }

  /**
   * Get the database adapter (global adapter must be initialized first)
   */
  protected getAdapter(): DatabaseAdapter {
    if (!this.adapter) {
      this.adapter = getAdapterSync();
    }
    return this.adapter;
  }

  /**
   * Execute a query that returns rows
   */
  protected async query<T extends object = Row>(sql: string, params?: QueryParams): Promise<T[]> {
    return this.getAdapter().query<T>(sql, params);
  }

  /**
   * Execute a query that returns a single row
   */
  protected async queryOne<T extends object = Row>(sql: string, params?: QueryParams): Promise<T | null> {
    return this.getAdapter().queryOne<T>(sql, params);
  }

  /**
   * Execute a statement (INSERT, UPDATE, DELETE)
   */
  protected async execute(sql: string, params?: QueryParams): Promise<{ changes: number }> {
    return this.getAdapter().execute(sql, params);
  }

  /**
   * Run operations in a transaction on a single client
   */
  protected async transaction<T>(fn: (tx: QueryExecutor) => Promise<T>): Promise<T> {
    return this.getAdapter().transaction(fn);
  }
}
