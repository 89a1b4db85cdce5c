/**
 * ILogService - Structured Logging Interface
 *
 * Usage:
 *   const log = registry.get(Services.Log);
 *   log.info('Backup created', { fileName });
 *
 *   // Scoped logger for a module
 *   const backupLog = log.child('Backups');
 *   backupLog.warn('pg_restore reported warnings', { count: 2 });
 *   // Output: [Backups] pg_restore reported warnings { count: 2 }
 */

export interface ILogService {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;

  /**
   * Create a child logger scoped to a module.
   * The module name is prepended to all log messages.
   */
  child(module: string): ILogService;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
