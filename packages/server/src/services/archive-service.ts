/**
 * Archive Service
 *
 * Archive-then-purge: each table is saved as JSON plus a single-table
 * pg_dump, then emptied. Tables are processed one at a time and a failure
 * on one is recorded in the report without stopping the rest.
 */

import { mkdir, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import {
  CommandFailedError,
  NotFoundError,
  assertSafeFileName,
  buildDeleteAll,
  buildPgDumpArgs,
  buildPurgeReferencing,
  formatCommand,
  formatTimestamp,
  getErrorCode,
  getErrorMessage,
  normalizeRow,
  parseArchiveFolderDate,
  quoteIdentifier,
} from '@pgdesk/core';
import { getAdapterSync } from '../db/adapters/index.js';
import {
  getDatabaseConfig,
  toPgConnectionOptions,
  type DatabaseAdapter,
  type DatabaseConfig,
} from '../db/adapters/types.js';
import { CatalogRepository } from '../db/repositories/catalog.js';
import { ensureDir, getArchiveDir, resolvePgTool } from '../paths/index.js';
import { ARCHIVE_REPORT_FILE, MAINTENANCE_LIST_LIMIT } from '../config/defaults.js';
import { pgEnv } from './backup-service.js';
import { operationLock, type OperationLock } from './operation-status.js';
import { runProcess } from './process-runner.js';
import { getLog } from './log.js';

const log = getLog('Archives');

// ============================================================================
// Types
// ============================================================================

export interface ArchivedTable {
  name: string;
  rowsArchived: number;
  deletedRows: number;
  /** Rows removed from referencing tables before the purge */
  dependentRowsDeleted: number;
  jsonPath: string;
  backupPath: string;
}

export interface FailedTable {
  name: string;
  error: string;
}

export type ArchiveTableResult = ArchivedTable | FailedTable;

export interface ArchiveReport {
  /** YYYYMMDD_HHMMSS stamp of the run, matching the folder name */
  timestamp: string;
  reason: string;
  tables: ArchiveTableResult[];
  totalRowsArchived: number;
}

export interface ArchiveResult extends ArchiveReport {
  reportPath: string;
}

export interface ArchiveFolder {
  name: string;
  /** YYYY-MM-DD HH:mm:ss for stamped folders, else the folder name */
  date: string;
  path: string;
}

export interface ArchiveOptions {
  /** Delete referencing rows in other tables first (default true) */
  purgeDependents?: boolean;
}

export interface ArchiveServiceOptions {
  adapter?: DatabaseAdapter;
  config?: DatabaseConfig;
  catalog?: CatalogRepository;
  lock?: OperationLock;
}

export function isArchivedTable(entry: ArchiveTableResult): entry is ArchivedTable {
  return !('error' in entry);
}

// ============================================================================
// ArchiveService
// ============================================================================

export class ArchiveService {
  private readonly adapter: DatabaseAdapter | undefined;
  private readonly config: DatabaseConfig | undefined;
  private readonly catalog: CatalogRepository;
  private readonly lock: OperationLock;

  constructor(options: ArchiveServiceOptions = {}) {
    this.adapter = options.adapter;
    this.config = options.config;
    this.catalog = options.catalog ?? new CatalogRepository(options.adapter);
    this.lock = options.lock ?? operationLock;
  }

  private getDb(): DatabaseAdapter {
    return this.adapter ?? getAdapterSync();
  }

  private appendOutput = (line: string): void => {
    this.lock.appendOutput(line);
    log.debug(line);
  };

  async archiveTables(tables: string[], reason: string, options: ArchiveOptions = {}): Promise<ArchiveResult> {
    const purgeDependents = options.purgeDependents ?? true;

    return this.lock.runExclusive('archive', async () => {
      const stamp = formatTimestamp(new Date());
      const folder = await this.createRunFolder(stamp);
      const report: ArchiveReport = {
        timestamp: stamp,
        reason,
        tables: [],
        totalRowsArchived: 0,
      };

      log.info(`Archiving ${tables.length} table(s) into ${folder}`);
      for (const table of tables) {
        try {
          const entry = await this.archiveTable(table, folder, purgeDependents);
          report.tables.push(entry);
          report.totalRowsArchived += entry.rowsArchived;
          this.lock.appendOutput(`Archived ${table}: ${entry.rowsArchived} rows`);
        } catch (error) {
          const message = getErrorMessage(error);
          log.warn(`Archiving ${table} failed: ${message}`);
          this.lock.appendOutput(`Failed to archive ${table}: ${message}`);
          report.tables.push({ name: table, error: message });
        }
      }

      const reportPath = join(folder, ARCHIVE_REPORT_FILE);
      await writeFile(reportPath, JSON.stringify(report, null, 2), 'utf-8');
      log.info(`Archive finished: ${report.totalRowsArchived} rows archived`);

      return { ...report, reportPath };
    });
  }

  /**
   * Create the folder for one run. A run in the same second as an earlier
   * one gets a `_2`, `_3`, ... suffix instead of reusing its folder.
   */
  private async createRunFolder(stamp: string): Promise<string> {
    const root = await ensureDir(getArchiveDir());
    for (let attempt = 1; ; attempt++) {
      const folder = join(root, attempt === 1 ? stamp : `${stamp}_${attempt}`);
      try {
        await mkdir(folder);
        return folder;
      } catch (error) {
        if (getErrorCode(error) !== 'EEXIST') throw error;
      }
    }
  }

  private async archiveTable(table: string, folder: string, purgeDependents: boolean): Promise<ArchivedTable> {
    await this.catalog.requireTable(table);
    const db = this.getDb();

    const rows = (await db.query(`SELECT * FROM ${quoteIdentifier(table)}`)).map(normalizeRow);
    const jsonPath = join(folder, `${table}.json`);
    await writeFile(jsonPath, JSON.stringify(rows, null, 2), 'utf-8');

    const backupPath = join(folder, `${table}.backup`);
    await this.dumpTable(table, backupPath);

    const references = purgeDependents
      ? (await this.catalog.getReferencingForeignKeys(table)).filter((ref) => ref.table !== table)
      : [];

    const { dependentRowsDeleted, deletedRows } = await db.transaction(async (tx) => {
      let dependentRows = 0;
      for (const ref of references) {
        const purge = buildPurgeReferencing(table, ref);
        const { changes } = await tx.execute(purge.text, purge.values);
        dependentRows += changes;
      }
      const deleteAll = buildDeleteAll(table);
      const { changes } = await tx.execute(deleteAll.text, deleteAll.values);
      return { dependentRowsDeleted: dependentRows, deletedRows: changes };
    });

    return { name: table, rowsArchived: rows.length, deletedRows, dependentRowsDeleted, jsonPath, backupPath };
  }

  private async dumpTable(table: string, backupPath: string): Promise<void> {
    const config = this.config ?? getDatabaseConfig();
    const tool = resolvePgTool('pg_dump');
    const args = buildPgDumpArgs(toPgConnectionOptions(config), backupPath, [table]);
    const result = await runProcess(tool, args, { env: pgEnv(config), onLine: this.appendOutput });
    if (result.exitCode !== 0) {
      throw new CommandFailedError(result.stderr.trim() || `pg_dump exited with code ${result.exitCode}`, {
        command: formatCommand(tool, args),
      });
    }
  }

  /**
   * Archive folders, newest (by name) first.
   */
  async listArchives(limit = MAINTENANCE_LIST_LIMIT): Promise<ArchiveFolder[]> {
    const dir = getArchiveDir();
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isDirectory())
        .map((entry) => entry.name)
        .sort((a, b) => b.localeCompare(a))
        .slice(0, Math.max(0, limit))
        .map((name) => ({ name, date: parseArchiveFolderDate(name), path: join(dir, name) }));
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') return [];
      throw error;
    }
  }

  async deleteArchive(name: string): Promise<{ deleted: string }> {
    const safe = assertSafeFileName(basename(name.trim()), 'Archive name');
    const path = join(getArchiveDir(), safe);
    let isDirectory = false;
    try {
      isDirectory = (await stat(path)).isDirectory();
    } catch (error) {
      if (getErrorCode(error) !== 'ENOENT') throw error;
    }
    if (!isDirectory) {
      throw new NotFoundError('Archive', safe);
    }

    await rm(path, { recursive: true, force: true });
    log.info(`Deleted archive ${safe}`);
    return { deleted: safe };
  }
}

export function createArchiveService(): ArchiveService {
  return new ArchiveService();
}
