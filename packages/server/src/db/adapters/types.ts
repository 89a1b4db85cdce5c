/**
 * Database Adapter Types
 *
 * Database adapter interface (PostgreSQL) and connection configuration
 */

import type { PgConnectionOptions, Row } from '@pgdesk/core';
import { getLog } from '../../services/log.js';
import { DB_DEFAULT_PORT, DB_POOL_MAX } from '../../config/defaults.js';

const log = getLog('DbAdapter');

export type DatabaseType = 'postgres';

export type { Row };

/**
 * Query parameters
 */
export type QueryParams = unknown[];

/**
 * Full outcome of a single statement, for callers that need more than rows
 */
export interface StatementResult {
  /** Command tag, e.g. SELECT, INSERT, UPDATE */
  command: string;
  rowCount: number;
  /** Result column names; empty when the statement returned no result set */
  fields: string[];
  rows: Row[];
}

/**
 * Query surface shared by the pool and a transaction's client
 */
export interface QueryExecutor {
  /**
   * Execute a query that returns rows
   */
  query<T extends object = Row>(sql: string, params?: QueryParams): Promise<T[]>;

  /**
   * Execute a statement (INSERT, UPDATE, DELETE)
   * Returns the number of affected rows
   */
  execute(sql: string, params?: QueryParams): Promise<{ changes: number }>;
}

/**
 * Database adapter interface
 * All database operations go through this interface
 */
export interface DatabaseAdapter extends QueryExecutor {
  /** Database type identifier */
  readonly type: DatabaseType;

  /** Check if connection is active */
  isConnected(): boolean;

  /**
   * Execute a query that returns a single row
   */
  queryOne<T extends object = Row>(sql: string, params?: QueryParams): Promise<T | null>;

  /**
   * Execute arbitrary SQL and report the last statement's result.
   * Without params the text may hold several statements.
   */
  run(sql: string, params?: QueryParams): Promise<StatementResult>;

  /**
   * Execute statements on one client inside BEGIN/COMMIT
   */
  transaction<T>(fn: (tx: QueryExecutor) => Promise<T>): Promise<T>;

  /**
   * Close the database connection
   */
  close(): Promise<void>;
}

/**
 * Database configuration
 */
export interface DatabaseConfig {
  type: DatabaseType;
  postgresUrl: string;
  postgresHost: string;
  postgresPort: number;
  postgresUser: string;
  postgresPassword: string;
  postgresDatabase: string;
  postgresPoolSize: number;
}

function parsePort(value: string | undefined): number {
  const port = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isInteger(port) && port > 0 ? port : DB_DEFAULT_PORT;
}

/**
 * Get database configuration from environment.
 *
 * DATABASE_URL wins when set; its parts also feed the pg_dump/pg_restore
 * connection arguments. Otherwise POSTGRES_* variables are used.
 */
export function getDatabaseConfig(): DatabaseConfig {
  const env = process.env;
  const isProduction = env.NODE_ENV === 'production';
  const hasExplicitConfig = !!(env.DATABASE_URL || env.POSTGRES_HOST || env.POSTGRES_PASSWORD);

  if (isProduction && !hasExplicitConfig) {
    log.warn(
      'Running in production without explicit database credentials. ' +
        'Set DATABASE_URL or POSTGRES_* environment variables.'
    );
  }

  const poolSize = env.POSTGRES_POOL_SIZE ? Number.parseInt(env.POSTGRES_POOL_SIZE, 10) : Number.NaN;
  let host = env.POSTGRES_HOST || 'localhost';
  let port = parsePort(env.POSTGRES_PORT);
  let user = env.POSTGRES_USER || 'postgres';
  let password = env.POSTGRES_PASSWORD || '';
  let database = env.POSTGRES_DB || 'postgres';

  if (env.DATABASE_URL) {
    const url = new URL(env.DATABASE_URL);
    host = url.hostname || host;
    port = url.port ? parsePort(url.port) : port;
    user = url.username ? decodeURIComponent(url.username) : user;
    password = url.password ? decodeURIComponent(url.password) : password;
    database = url.pathname.length > 1 ? decodeURIComponent(url.pathname.slice(1)) : database;
  }

  const postgresUrl =
    env.DATABASE_URL ||
    `postgresql://${encodeURIComponent(user)}:${encodeURIComponent(password)}@${host}:${port}/${encodeURIComponent(database)}`;

  return {
    type: 'postgres',
    postgresUrl,
    postgresHost: host,
    postgresPort: port,
    postgresUser: user,
    postgresPassword: password,
    postgresDatabase: database,
    postgresPoolSize: Number.isInteger(poolSize) && poolSize > 0 ? poolSize : DB_POOL_MAX,
  };
}

/**
 * Connection arguments for the PostgreSQL client utilities
 */
export function toPgConnectionOptions(config: DatabaseConfig): PgConnectionOptions {
  return {
    host: config.postgresHost,
    port: config.postgresPort,
    user: config.postgresUser,
    database: config.postgresDatabase,
  };
}
