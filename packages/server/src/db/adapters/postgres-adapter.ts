/**
 * PostgreSQL Database Adapter
 *
 * Uses the 'pg' package with connection pooling
 */

import type {
  DatabaseAdapter,
  DatabaseConfig,
  QueryExecutor,
  QueryParams,
  Row,
  StatementResult,
} from './types.js';
import pg from 'pg';
import type { QueryResult } from 'pg';
import { getLog } from '../../services/log.js';
import { DB_IDLE_TIMEOUT_MS, DB_CONNECT_TIMEOUT_MS } from '../../config/defaults.js';

const log = getLog('PostgresAdapter');

const { Pool } = pg;
type PoolType = InstanceType<typeof Pool>;

/** What the pool and a checked-out client have in common */
interface ClientLike {
  query(text: string, values?: unknown[]): Promise<QueryResult>;
}

/** OID of the DATE type; kept as YYYY-MM-DD text instead of a local-midnight Date */
const DATE_OID = 1082;

function toStatementResult(result: QueryResult | QueryResult[]): StatementResult {
  const last = Array.isArray(result) ? result[result.length - 1] : result;
  if (!last) {
    return { command: '', rowCount: 0, fields: [], rows: [] };
  }
  return {
    command: last.command ?? '',
    rowCount: last.rowCount ?? 0,
    fields: (last.fields ?? []).map((f) => f.name),
    rows: last.rows ?? [],
  };
}

function executorFor(client: ClientLike): QueryExecutor {
  return {
    async query<T extends object = Row>(sql: string, params: QueryParams = []): Promise<T[]> {
      const result = await client.query(sql, params);
      return result.rows;
    },
    async execute(sql: string, params: QueryParams = []): Promise<{ changes: number }> {
      const result = await client.query(sql, params);
      return { changes: result.rowCount ?? 0 };
    },
  };
}

export class PostgresAdapter implements DatabaseAdapter {
  readonly type = 'postgres' as const;
  private pool: PoolType | null = null;
  private readonly config: DatabaseConfig;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  /**
   * Initialize the connection pool and verify it with a test query
   */
  async initialize(): Promise<void> {
    pg.types.setTypeParser(DATE_OID, (value: string) => value);

    this.pool = new Pool({
      connectionString: this.config.postgresUrl,
      max: this.config.postgresPoolSize,
      idleTimeoutMillis: DB_IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: DB_CONNECT_TIMEOUT_MS,
    });

    this.pool.on('error', (err) => {
      log.error('Idle client error', { error: err.message });
    });

    const client = await this.pool.connect();
    try {
      await client.query('SELECT 1');
      log.info(`Connected to ${this.config.postgresHost}:${this.config.postgresPort}/${this.config.postgresDatabase}`);
    } finally {
      client.release();
    }
  }

  isConnected(): boolean {
    return this.pool !== null;
  }

  private requirePool(): PoolType {
    if (!this.pool) throw new Error('Database not initialized');
    return this.pool;
  }

  async query<T extends object = Row>(sql: string, params: QueryParams = []): Promise<T[]> {
    return executorFor(this.requirePool()).query<T>(sql, params);
  }

  async queryOne<T extends object = Row>(sql: string, params: QueryParams = []): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }

  async execute(sql: string, params: QueryParams = []): Promise<{ changes: number }> {
    return executorFor(this.requirePool()).execute(sql, params);
  }

  async run(sql: string, params?: QueryParams): Promise<StatementResult> {
    const pool = this.requirePool();
    // pg resolves to an array of results for multi-statement text
    const result: QueryResult | QueryResult[] = params && params.length > 0
      ? await pool.query(sql, params)
      : await pool.query(sql);
    return toStatementResult(result);
  }

  async transaction<T>(fn: (tx: QueryExecutor) => Promise<T>): Promise<T> {
    const client = await this.requirePool().connect();
    try {
      await client.query('BEGIN');
      const result = await fn(executorFor(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        log.error('Rollback failed:', rollbackError);
      }
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      log.info('Connection pool closed');
    }
  }
}
