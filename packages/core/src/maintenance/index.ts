/**
 * Backup, restore and archive helpers
 */

export {
  BACKUP_EXTENSION,
  formatTimestamp,
  formatDisplayDate,
  assertSafeFileName,
  defaultBackupName,
  normalizeBackupName,
  parseArchiveFolderDate,
} from './naming.js';
export {
  buildPgDumpArgs,
  resetSchemaSql,
  buildResetSchemaArgs,
  buildPgRestoreArgs,
  formatCommand,
  type PgConnectionOptions,
} from './pg-commands.js';
export { classifyRestoreOutput, isRestoreFailure, type RestoreOutput } from './restore-output.js';
