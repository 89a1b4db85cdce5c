/**
 * Backup and archive naming
 *
 * Timestamps use server local time, matching what operators see on disk.
 */

import { ValidationError } from '../types/errors.js';

export const BACKUP_EXTENSION = '.backup';

const SAFE_FILE_NAME = /^[\w.-]+$/;
const ARCHIVE_STAMP = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})(?:_\d+)?$/;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * YYYYMMDD_HHMMSS
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * YYYY-MM-DD HH:mm:ss
 */
export function formatDisplayDate(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Reject names that could leave the target directory.
 */
export function assertSafeFileName(name: string, label = 'File name'): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError(`${label} is required`);
  }
  if (!SAFE_FILE_NAME.test(trimmed) || trimmed === '.' || trimmed === '..') {
    throw new ValidationError(`${label} may only contain letters, digits, "_", "-" and "."`);
  }
  return trimmed;
}

export function defaultBackupName(database: string, date: Date): string {
  const prefix = database.replace(/[^\w.-]/g, '_') || 'database';
  return `${prefix}_backup_${formatTimestamp(date)}${BACKUP_EXTENSION}`;
}

/**
 * Validate a requested backup name and make sure it ends in .backup.
 */
export function normalizeBackupName(name: string): string {
  const safe = assertSafeFileName(name, 'Backup name');
  return safe.endsWith(BACKUP_EXTENSION) ? safe : `${safe}${BACKUP_EXTENSION}`;
}

/**
 * Display date for an archive folder named YYYYMMDD_HHMMSS (or YYYYMMDD_HHMMSS_N), else the name.
 */
export function parseArchiveFolderDate(name: string): string {
  const m = ARCHIVE_STAMP.exec(name);
  if (!m) return name;
  const [, year, month, day, hour, minute, second] = m;
  return `${year}-${month}-${day} ${hour}:${minute}:${second}`;
}
