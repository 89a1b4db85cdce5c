/**
 * LogService Implementation
 *
 * Structured logging with two modes:
 * - Development: human-readable output with module prefix
 * - Production: one JSON object per line
 *
 * Usage:
 *   const log = createLogService({ level: 'info' });
 *   log.info('Server started', { port: 8080 });
 *
 *   const backupLog = log.child('Backups');
 *   backupLog.info('Backup created');
 *   // Dev:  [Backups] Backup created
 *   // Prod: {"level":"info","ts":"...","module":"Backups","msg":"Backup created"}
 */

import { isLogLevel, type ILogService, type LogLevel } from '@pgdesk/core';

export interface LogServiceOptions {
  level?: LogLevel;
  json?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export class LogService implements ILogService {
  private readonly level: LogLevel;
  private readonly module: string | null;
  private readonly json: boolean;

  constructor(options?: LogServiceOptions & { module?: string }) {
    this.level = options?.level ?? 'info';
    this.module = options?.module ?? null;
    this.json = options?.json ?? (process.env.NODE_ENV === 'production');
  }

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  child(module: string): ILogService {
    return new LogService({
      level: this.level,
      json: this.json,
      module: this.module ? `${this.module}:${module}` : module,
    });
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;
    const fn = WRITERS[level];

    if (this.json) {
      fn(JSON.stringify({
        level,
        ts: new Date().toISOString(),
        ...(this.module ? { module: this.module } : {}),
        msg: message,
        ...toRecord(data),
      }));
      return;
    }

    const prefix = this.module ? `[${this.module}] ` : '';
    if (data !== undefined) {
      fn(`${prefix}${message}`, data);
    } else {
      fn(`${prefix}${message}`);
    }
  }
}

function toRecord(data: unknown): Record<string, unknown> {
  if (data instanceof Error) return { error: data.message };
  if (data !== null && typeof data === 'object' && !Array.isArray(data)) {
    return Object.fromEntries(Object.entries(data));
  }
  return data !== undefined ? { data } : {};
}

/**
 * Create a LogService from options, falling back to LOG_LEVEL.
 */
export function createLogService(options?: LogServiceOptions): ILogService {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  return new LogService({
    ...options,
    level: options?.level ?? (isLogLevel(envLevel) ? envLevel : 'info'),
  });
}
