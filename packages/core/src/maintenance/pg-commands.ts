/**
 * Argument builders for the PostgreSQL client utilities
 *
 * The password never appears in arguments; callers pass it as PGPASSWORD.
 */

import { quoteIdentifier, qualifiedTablePattern } from '../sql/identifiers.js';

export interface PgConnectionOptions {
  host: string;
  port: number;
  user: string;
  database: string;
}

function connectionArgs(conn: PgConnectionOptions): string[] {
  return ['-h', conn.host, '-p', String(conn.port), '-U', conn.user, '-d', conn.database];
}

/**
 * pg_dump in custom format, optionally limited to some tables.
 */
export function buildPgDumpArgs(
  conn: PgConnectionOptions,
  outputPath: string,
  tables: readonly string[] = []
): string[] {
  return [
    ...connectionArgs(conn),
    '-F', 'c',
    '-f', outputPath,
    ...tables.flatMap((table) => ['-t', qualifiedTablePattern(table)]),
  ];
}

export function resetSchemaSql(user: string): string {
  return (
    'DROP SCHEMA IF EXISTS public CASCADE; ' +
    'CREATE SCHEMA public; ' +
    `GRANT ALL ON SCHEMA public TO ${quoteIdentifier(user)}; ` +
    'GRANT ALL ON SCHEMA public TO public;'
  );
}

/**
 * psql invocation that recreates an empty public schema before a restore.
 */
export function buildResetSchemaArgs(conn: PgConnectionOptions): string[] {
  return [...connectionArgs(conn), '-v', 'ON_ERROR_STOP=1', '-c', resetSchemaSql(conn.user)];
}

export function buildPgRestoreArgs(conn: PgConnectionOptions, backupPath: string): string[] {
  return [...connectionArgs(conn), '-v', '--no-owner', '--no-privileges', backupPath];
}

/**
 * Render a command line for logs and error reports.
 */
export function formatCommand(tool: string, args: readonly string[]): string {
  const quoted = args.map((arg) =>
    arg === '' || /[\s'"\\$;]/.test(arg) ? `'${arg.replace(/'/g, `'\\''`)}'` : arg
  );
  return [tool, ...quoted].join(' ');
}
