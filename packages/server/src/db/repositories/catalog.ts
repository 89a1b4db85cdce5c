/**
 * Catalog Repository
 *
 * Schema introspection for the `public` schema: tables, columns, primary
 * keys, incoming foreign keys and database-wide statistics.
 */

import {
  NotFoundError,
  buildCountQuery,
  getErrorMessage,
  type ColumnInfo,
  type ForeignKeyReference,
  type TableSummary,
} from '@pgdesk/core';
import { BaseRepository } from './base.js';
import { getLog } from '../../services/log.js';

const log = getLog('CatalogRepo');

/** Column used when a table declares no primary key */
export const DEFAULT_PRIMARY_KEY = 'id';

export interface DatabaseStats {
  database: { size: string; sizeBytes: number };
  tables: Array<{ name: string; rowCount: number; size: string }>;
  connections: { active: number; max: number };
  version: string;
}

interface ColumnRow {
  column_name: string;
  data_type: string;
  is_nullable: string;
  column_default: string | null;
}

interface ForeignKeyRow {
  table_name: string;
  column_name: string;
  referenced_column: string;
  delete_rule: string;
}

function toInt(value: string | number | null | undefined, fallback = 0): number {
  const parsed = typeof value === 'number' ? value : Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

export class CatalogRepository extends BaseRepository {
  /**
   * Base tables in `public`, excluding pg_* and sql_* names, sorted by name.
   */
  async listTables(): Promise<string[]> {
    const rows = await this.query<{ table_name: string }>(
      `SELECT table_name
       FROM information_schema.tables
       WHERE table_schema = 'public'
         AND table_type = 'BASE TABLE'
         AND table_name NOT LIKE 'pg\\_%'
         AND table_name NOT LIKE 'sql\\_%'
       ORDER BY table_name`
    );
    return rows.map((r) => r.table_name);
  }

  /**
   * Return the table name when it exists, otherwise throw NotFoundError.
   */
  async requireTable(table: string): Promise<string> {
    const tables = await this.listTables();
    if (!tables.includes(table)) {
      throw new NotFoundError('Table', table);
    }
    return table;
  }

  async getTableColumns(table: string): Promise<ColumnInfo[]> {
    const rows = await this.query<ColumnRow>(
      `SELECT column_name, data_type, is_nullable, column_default
       FROM information_schema.columns
       WHERE table_schema = 'public' AND table_name = $1
       ORDER BY ordinal_position`,
      [table]
    );
    return rows.map((r) => ({
      name: r.column_name,
      type: r.data_type,
      nullable: r.is_nullable === 'YES',
      default: r.column_default ?? null,
    }));
  }

  /**
   * First column of the primary key, or `id` when there is none.
   */
  async getPrimaryKey(table: string): Promise<string> {
    try {
      const row = await this.queryOne<{ column_name: string }>(
        `SELECT kcu.column_name
         FROM information_schema.table_constraints tc
         JOIN information_schema.key_column_usage kcu
           ON tc.constraint_name = kcu.constraint_name
          AND tc.table_schema = kcu.table_schema
          AND tc.table_name = kcu.table_name
         WHERE tc.constraint_type = 'PRIMARY KEY'
           AND tc.table_schema = 'public'
           AND tc.table_name = $1
         ORDER BY kcu.ordinal_position
         LIMIT 1`,
        [table]
      );
      return row?.column_name ?? DEFAULT_PRIMARY_KEY;
    } catch (error) {
      log.warn(`Primary key lookup failed for ${table}: ${getErrorMessage(error)}`);
      return DEFAULT_PRIMARY_KEY;
    }
  }

  /**
   * Single-column foreign keys in `public` that point at `table`.
   * Self-references are included.
   */
  async getReferencingForeignKeys(table: string): Promise<ForeignKeyReference[]> {
    const rows = await this.query<ForeignKeyRow>(
      `SELECT src.relname AS table_name,
              att.attname AS column_name,
              ref_att.attname AS referenced_column,
              CASE con.confdeltype
                WHEN 'a' THEN 'NO ACTION'
                WHEN 'r' THEN 'RESTRICT'
                WHEN 'c' THEN 'CASCADE'
                WHEN 'n' THEN 'SET NULL'
                WHEN 'd' THEN 'SET DEFAULT'
              END AS delete_rule
       FROM pg_constraint con
       JOIN pg_class src ON src.oid = con.conrelid
       JOIN pg_namespace src_ns ON src_ns.oid = src.relnamespace
       JOIN pg_class tgt ON tgt.oid = con.confrelid
       JOIN pg_namespace tgt_ns ON tgt_ns.oid = tgt.relnamespace
       JOIN pg_attribute att ON att.attrelid = con.conrelid AND att.attnum = con.conkey[1]
       JOIN pg_attribute ref_att ON ref_att.attrelid = con.confrelid AND ref_att.attnum = con.confkey[1]
       WHERE con.contype = 'f'
         AND array_length(con.conkey, 1) = 1
         AND src_ns.nspname = 'public'
         AND tgt_ns.nspname = 'public'
         AND tgt.relname = $1
       ORDER BY src.relname, att.attname`,
      [table]
    );
    return rows.map((r) => ({
      table: r.table_name,
      column: r.column_name,
      referencedColumn: r.referenced_column,
      deleteRule: r.delete_rule,
    }));
  }

  async countRows(table: string): Promise<number> {
    const { text, values } = buildCountQuery(table);
    const row = await this.queryOne<{ count: string | number }>(text, values);
    return toInt(row?.count);
  }

  /**
   * Every table with its row count and column names, for the dashboard.
   */
  async getTableSummaries(): Promise<TableSummary[]> {
    const tables = await this.listTables();
    const summaries: TableSummary[] = [];
    for (const name of tables) {
      const columns = await this.getTableColumns(name);
      summaries.push({
        name,
        rowCount: await this.countRows(name),
        columns: columns.map((c) => c.name),
      });
    }
    return summaries;
  }

  async getDatabaseStats(): Promise<DatabaseStats> {
    const sizeResult = await this.queryOne<{ size: string; raw_size: string }>(
      `SELECT
        pg_size_pretty(pg_database_size(current_database())) as size,
        pg_database_size(current_database())::text as raw_size`
    );

    const tableStats = await this.query<{ table_name: string; row_count: string; size: string }>(`
      SELECT
        relname as table_name,
        n_live_tup::text as row_count,
        pg_size_pretty(pg_total_relation_size(relid)) as size
      FROM pg_stat_user_tables
      ORDER BY pg_total_relation_size(relid) DESC
      LIMIT 20
    `);

    const connInfo = await this.queryOne<{ active_connections: string; max_connections: string }>(`
      SELECT
        (SELECT count(*) FROM pg_stat_activity)::text as active_connections,
        current_setting('max_connections') as max_connections
    `);

    const versionResult = await this.queryOne<{ version: string }>('SELECT version()');

    return {
      database: {
        size: sizeResult?.size || 'unknown',
        sizeBytes: toInt(sizeResult?.raw_size),
      },
      tables: tableStats.map((t) => ({
        name: t.table_name,
        rowCount: toInt(t.row_count),
        size: t.size,
      })),
      connections: {
        active: toInt(connInfo?.active_connections),
        max: toInt(connInfo?.max_connections, 100),
      },
      version: versionResult?.version || 'unknown',
    };
  }
}

export function createCatalogRepository(): CatalogRepository {
  return new CatalogRepository();
}
