/**
 * Backup Service
 *
 * pg_dump backups, psql + pg_restore restores, and backup file management.
 * Backup and restore hold the shared maintenance lock.
 */

import { readdir, stat, unlink } from 'node:fs/promises';
import { basename, join } from 'node:path';
import {
  BACKUP_EXTENSION,
  CommandFailedError,
  NotFoundError,
  assertSafeFileName,
  buildPgDumpArgs,
  buildPgRestoreArgs,
  buildResetSchemaArgs,
  classifyRestoreOutput,
  defaultBackupName,
  formatCommand,
  formatDisplayDate,
  getErrorCode,
  isRestoreFailure,
  normalizeBackupName,
} from '@pgdesk/core';
import { CatalogRepository } from '../db/repositories/catalog.js';
import { getDatabaseConfig, toPgConnectionOptions, type DatabaseConfig } from '../db/adapters/types.js';
import { ensureDir, getBackupDir, resolvePgTool } from '../paths/index.js';
import { MAINTENANCE_LIST_LIMIT } from '../config/defaults.js';
import { operationLock, type OperationLock } from './operation-status.js';
import { runProcess } from './process-runner.js';
import { getLog } from './log.js';

const log = getLog('Backups');

// ============================================================================
// Types
// ============================================================================

export interface CreateBackupOptions {
  /** File name; `.backup` is appended when missing */
  name?: string;
  /** Limit the dump to these tables */
  tables?: string[];
}

export interface BackupResult {
  fileName: string;
  backupPath: string;
  fileSize: number;
  tables: string[] | 'all';
  timestamp: string;
}

export interface RestoreResult {
  message: string;
  backupPath: string;
  timestamp: string;
  warnings: string[];
}

export interface BackupFile {
  name: string;
  size: number;
  modifiedAt: string;
  /** Local time, YYYY-MM-DD HH:mm:ss */
  date: string;
}

export interface BackupServiceOptions {
  config?: DatabaseConfig;
  catalog?: CatalogRepository;
  lock?: OperationLock;
}

/**
 * Child environment carrying the password for the client tools.
 */
export function pgEnv(config: DatabaseConfig): NodeJS.ProcessEnv {
  return { ...process.env, PGPASSWORD: config.postgresPassword };
}

// ============================================================================
// BackupService
// ============================================================================

export class BackupService {
  private readonly catalog: CatalogRepository;
  private readonly lock: OperationLock;
  private readonly config: DatabaseConfig | undefined;

  constructor(options: BackupServiceOptions = {}) {
    this.catalog = options.catalog ?? new CatalogRepository();
    this.lock = options.lock ?? operationLock;
    this.config = options.config;
  }

  private getConfig(): DatabaseConfig {
    return this.config ?? getDatabaseConfig();
  }

  private appendOutput = (line: string): void => {
    this.lock.appendOutput(line);
    log.debug(line);
  };

  async createBackup(options: CreateBackupOptions = {}): Promise<BackupResult> {
    const config = this.getConfig();
    const fileName = options.name?.trim()
      ? normalizeBackupName(options.name)
      : defaultBackupName(config.postgresDatabase, new Date());
    const tables = options.tables ?? [];
    for (const table of tables) {
      await this.catalog.requireTable(table);
    }

    return this.lock.runExclusive('backup', async () => {
      const dir = await ensureDir(getBackupDir());
      const backupPath = join(dir, fileName);
      const tool = resolvePgTool('pg_dump');
      const args = buildPgDumpArgs(toPgConnectionOptions(config), backupPath, tables);
      const command = formatCommand(tool, args);

      log.info(`Creating backup ${fileName}`);
      const result = await runProcess(tool, args, { env: pgEnv(config), onLine: this.appendOutput });
      if (result.exitCode !== 0) {
        throw new CommandFailedError(result.stderr.trim() || `pg_dump exited with code ${result.exitCode}`, {
          command,
        });
      }

      const info = await stat(backupPath);
      this.lock.appendOutput(`Backup saved to: ${fileName}`);
      log.info(`Backup ${fileName} created (${info.size} bytes)`);

      return {
        fileName,
        backupPath,
        fileSize: info.size,
        tables: tables.length > 0 ? tables : 'all',
        timestamp: new Date().toISOString(),
      };
    });
  }

  /**
   * Replace the public schema with the contents of a backup file.
   */
  async restoreBackup(fileName: string): Promise<RestoreResult> {
    const name = assertSafeFileName(basename(fileName.trim()), 'Backup file name');
    const backupPath = join(getBackupDir(), name);
    await this.requireBackupFile(backupPath, name);
    const config = this.getConfig();
    const conn = toPgConnectionOptions(config);
    const env = pgEnv(config);

    return this.lock.runExclusive('restore', async () => {
      const psql = resolvePgTool('psql');
      const resetArgs = buildResetSchemaArgs(conn);
      log.info(`Resetting public schema before restoring ${name}`);
      const reset = await runProcess(psql, resetArgs, { env, onLine: this.appendOutput });
      if (reset.exitCode !== 0) {
        const detail = reset.stderr.trim() || reset.stdout.trim() || 'Unknown error';
        throw new CommandFailedError(`Failed to prepare database (reset public schema): ${detail}`, {
          command: formatCommand(psql, resetArgs),
        });
      }

      const pgRestore = resolvePgTool('pg_restore');
      const restoreArgs = buildPgRestoreArgs(conn, backupPath);
      const result = await runProcess(pgRestore, restoreArgs, { env, onLine: this.appendOutput });
      const output = classifyRestoreOutput(result.stderr);

      if (isRestoreFailure(result.exitCode, output)) {
        throw new CommandFailedError(output.errors.join('\n'), {
          command: formatCommand(pgRestore, restoreArgs),
          warnings: output.warnings,
        });
      }
      if (output.warnings.length > 0) {
        log.warn(`Restore of ${name} finished with ${output.warnings.length} warning(s)`);
      }
      log.info(`Restored ${name}`);

      return {
        message: 'Database restored successfully',
        backupPath,
        timestamp: new Date().toISOString(),
        warnings: output.warnings,
      };
    });
  }

  /**
   * Newest backups first.
   */
  async listBackups(limit = MAINTENANCE_LIST_LIMIT): Promise<BackupFile[]> {
    const dir = getBackupDir();
    let names: string[];
    try {
      names = await readdir(dir);
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') return [];
      throw error;
    }

    const files: Array<BackupFile & { mtimeMs: number }> = [];
    for (const name of names) {
      if (!name.endsWith(BACKUP_EXTENSION)) continue;
      const info = await stat(join(dir, name));
      if (!info.isFile()) continue;
      files.push({
        name,
        size: info.size,
        modifiedAt: info.mtime.toISOString(),
        date: formatDisplayDate(info.mtime),
        mtimeMs: info.mtime.getTime(),
      });
    }

    return files
      .sort((a, b) => b.mtimeMs - a.mtimeMs)
      .slice(0, Math.max(0, limit))
      .map(({ mtimeMs: _mtimeMs, ...file }) => file);
  }

  async deleteBackup(name: string): Promise<{ deleted: string }> {
    const safe = assertSafeFileName(basename(name.trim()), 'Backup name');
    try {
      await unlink(join(getBackupDir(), safe));
    } catch (error) {
      if (getErrorCode(error) === 'ENOENT') {
        throw new NotFoundError('Backup', safe, { cause: error });
      }
      throw error;
    }
    log.info(`Deleted backup ${safe}`);
    return { deleted: safe };
  }

  private async requireBackupFile(path: string, name: string): Promise<void> {
    try {
      const info = await stat(path);
      if (info.isFile()) return;
    } catch (error) {
      if (getErrorCode(error) !== 'ENOENT') throw error;
    }
    throw new NotFoundError('Backup', name);
  }
}

export function createBackupService(): BackupService {
  return new BackupService();
}
