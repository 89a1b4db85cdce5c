/**
 * Maintenance Paths
 *
 * Backup and archive directories, resolved against the working directory:
 * - BACKUP_DIR   pg_dump custom-format files (*.backup)
 * - ARCHIVE_DIR  one YYYYMMDD_HHMMSS folder per archive run
 *
 * PG_BIN_DIR optionally points at the PostgreSQL client binaries.
 */

import { mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { DEFAULT_ARCHIVE_DIR, DEFAULT_BACKUP_DIR } from '../config/defaults.js';

export function getBackupDir(): string {
  return resolve(process.cwd(), process.env.BACKUP_DIR || DEFAULT_BACKUP_DIR);
}

export function getArchiveDir(): string {
  return resolve(process.cwd(), process.env.ARCHIVE_DIR || DEFAULT_ARCHIVE_DIR);
}

/**
 * Create a directory (and parents) if missing, returning it.
 */
export async function ensureDir(dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  return dir;
}

/**
 * Executable path for a PostgreSQL client tool, honoring PG_BIN_DIR.
 */
export function resolvePgTool(tool: 'pg_dump' | 'pg_restore' | 'psql'): string {
  const binDir = process.env.PG_BIN_DIR;
  return binDir ? join(binDir, tool) : tool;
}
