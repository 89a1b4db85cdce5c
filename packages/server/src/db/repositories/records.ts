/**
 * Records Repository
 *
 * Generic CRUD over any table in `public`. Table and column names are
 * checked against the catalog before they reach SQL text; values are
 * coerced by column type and always bound as parameters.
 */

import {
  DependencyConflictError,
  NotFoundError,
  QueryRejectedError,
  ValidationError,
  buildCountQuery,
  buildDelete,
  buildInsert,
  buildReferencingCount,
  buildSelectPage,
  buildSelectWhere,
  buildUpdate,
  coerceRecordValues,
  coerceValue,
  compactValues,
  normalizeRow,
  pickSortColumn,
  type ColumnInfo,
  type Condition,
  type Row,
  type SqlStatement,
  type TablePage,
} from '@pgdesk/core';
import pg from 'pg';
import { BaseRepository } from './base.js';
import { CatalogRepository } from './catalog.js';
import type { DatabaseAdapter } from '../adapters/types.js';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../../config/defaults.js';

const { DatabaseError } = pg;

export interface DeleteOptions {
  /** Skip the dependent-row check */
  force?: boolean;
}

export interface UpdateWhereResult {
  updatedCount: number;
  rows: Row[];
}

export interface DeleteWhereResult {
  deletedCount: number;
  rows: Row[];
}

/**
 * Errors reported by the server (constraint violations, bad input syntax)
 * become QueryRejectedError; client-side failures such as a dropped
 * connection are returned unchanged.
 */
function toQueryRejected(error: unknown): unknown {
  if (error instanceof DatabaseError && error.code) {
    return new QueryRejectedError(error.message, error.code, { cause: error });
  }
  return error;
}

function assertColumns(columns: readonly ColumnInfo[], names: Iterable<string>): void {
  const known = new Set(columns.map((c) => c.name));
  for (const name of names) {
    if (!known.has(name)) {
      throw new ValidationError(`Unknown column: ${name}`, { field: name });
    }
  }
}

export class RecordsRepository extends BaseRepository {
  private readonly catalog: CatalogRepository;

  constructor(adapter?: DatabaseAdapter, catalog?: CatalogRepository) {
    super(adapter);
    this.catalog = catalog ?? new CatalogRepository(adapter);
  }

  private async describe(table: string): Promise<ColumnInfo[]> {
    await this.catalog.requireTable(table);
    return this.catalog.getTableColumns(table);
  }

  /**
   * Primary key column and the id coerced to its type.
   */
  private async keyCondition(table: string, columns: readonly ColumnInfo[], id: string): Promise<Condition> {
    const pk = await this.catalog.getPrimaryKey(table);
    const column = columns.find((c) => c.name === pk);
    if (!column) {
      throw new ValidationError(`Table ${table} has no primary key column: ${pk}`, { field: pk });
    }
    return { [pk]: coerceValue(column.type, id) };
  }

  private async run(statement: SqlStatement): Promise<Row[]> {
    try {
      return await this.query(statement.text, statement.values);
    } catch (error) {
      throw toQueryRejected(error);
    }
  }

  async getTablePage(table: string, page = 1, pageSize = DEFAULT_PAGE_SIZE): Promise<TablePage> {
    const currentPage = Number.isFinite(page) ? Math.max(1, Math.trunc(page)) : 1;
    const size = Number.isFinite(pageSize)
      ? Math.min(MAX_PAGE_SIZE, Math.max(1, Math.trunc(pageSize)))
      : DEFAULT_PAGE_SIZE;

    const columns = (await this.describe(table)).map((c) => c.name);
    const count = buildCountQuery(table);
    const countRow = await this.queryOne<{ count: string | number }>(count.text, count.values);
    const totalCount = Number(countRow?.count ?? 0);

    const sortColumn = pickSortColumn(columns);
    const select = buildSelectPage(table, sortColumn, size, (currentPage - 1) * size);
    const rows = await this.query(select.text, select.values);

    return {
      totalCount,
      page: currentPage,
      pageSize: size,
      totalPages: Math.ceil(totalCount / size),
      data: rows.map(normalizeRow),
      columns,
      sortColumn,
    };
  }

  async getRecordById(table: string, id: string): Promise<Row | null> {
    const columns = await this.describe(table);
    const condition = await this.keyCondition(table, columns, id);
    const rows = await this.run(buildSelectWhere(table, condition, 1));
    const row = rows[0];
    return row ? normalizeRow(row) : null;
  }

  async insertRecord(table: string, data: Record<string, unknown>): Promise<Row> {
    const columns = await this.describe(table);
    const values = compactValues(data);
    assertColumns(columns, Object.keys(values));

    const rows = await this.run(buildInsert(table, coerceRecordValues(columns, values)));
    return normalizeRow(rows[0] ?? {});
  }

  async updateRecordById(table: string, id: string, data: Record<string, unknown>): Promise<Row> {
    const columns = await this.describe(table);
    const condition = await this.keyCondition(table, columns, id);
    const values = compactValues(data, Object.keys(condition));
    assertColumns(columns, Object.keys(values));

    const rows = await this.run(buildUpdate(table, coerceRecordValues(columns, values), condition));
    const row = rows[0];
    if (!row) {
      throw new NotFoundError('Record', `${table}/${id}`);
    }
    return normalizeRow(row);
  }

  async updateWhere(
    table: string,
    data: Record<string, unknown>,
    condition: Condition
  ): Promise<UpdateWhereResult> {
    const columns = await this.describe(table);
    const values = compactValues(data);
    assertColumns(columns, [...Object.keys(values), ...Object.keys(condition)]);

    const rows = await this.run(
      buildUpdate(table, coerceRecordValues(columns, values), coerceRecordValues(columns, condition))
    );
    return { updatedCount: rows.length, rows: rows.map(normalizeRow) };
  }

  async deleteRecordById(table: string, id: string, options: DeleteOptions = {}): Promise<{ deletedCount: number }> {
    const columns = await this.describe(table);
    const condition = await this.keyCondition(table, columns, id);
    if (!options.force) {
      await this.assertNoDependents(table, condition);
    }

    const rows = await this.run(buildDelete(table, condition));
    if (rows.length === 0) {
      throw new NotFoundError('Record', `${table}/${id}`);
    }
    return { deletedCount: rows.length };
  }

  async deleteWhere(table: string, condition: Condition, options: DeleteOptions = {}): Promise<DeleteWhereResult> {
    if (Object.keys(condition).length === 0) {
      throw new ValidationError('No conditions specified for delete');
    }
    const columns = await this.describe(table);
    assertColumns(columns, Object.keys(condition));
    const where = coerceRecordValues(columns, condition);
    if (!options.force) {
      await this.assertNoDependents(table, where);
    }

    const rows = await this.run(buildDelete(table, where));
    return { deletedCount: rows.length, rows: rows.map(normalizeRow) };
  }

  /**
   * Count rows in other tables that reference the rows matching `condition`.
   * Keys are `table.column` of the referencing foreign key; zero counts are omitted.
   */
  async findDependents(table: string, condition: Condition): Promise<Record<string, number>> {
    const references = await this.catalog.getReferencingForeignKeys(table);
    const dependents: Record<string, number> = {};
    for (const ref of references) {
      if (ref.table === table) continue;
      const statement = buildReferencingCount(table, condition, ref);
      const row = await this.queryOne<{ count: string | number }>(statement.text, statement.values);
      const count = Number(row?.count ?? 0);
      if (count > 0) {
        dependents[`${ref.table}.${ref.column}`] = count;
      }
    }
    return dependents;
  }

  private async assertNoDependents(table: string, condition: Condition): Promise<void> {
    const dependents = await this.findDependents(table, condition);
    if (Object.keys(dependents).length > 0) {
      throw new DependencyConflictError(dependents);
    }
  }
}

export function createRecordsRepository(): RecordsRepository {
  return new RecordsRepository();
}
