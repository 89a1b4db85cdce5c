/**
 * Logging Utility
 *
 * Scoped loggers for any module. Writes to console until the
 * ServiceRegistry has a log service registered, then delegates to it.
 *
 * Usage:
 *   import { getLog } from '@pgdesk/core';
 *   const log = getLog('Catalog');
 *   log.info('Loaded tables', { count: 12 });
 */

import { hasServiceRegistry, getServiceRegistry } from './registry.js';
import { Services } from './tokens.js';
import type { ILogService } from './log-service.js';

const loggers = new Map<string, ILogService>();

type LogMethod = 'debug' | 'info' | 'warn' | 'error';

function writeToConsole(method: LogMethod, prefix: string, msg: string, data: unknown): void {
  const sink = method === 'info' ? console.log : console[method];
  if (data !== undefined) sink(prefix, msg, data);
  else sink(prefix, msg);
}

/**
 * Resolve the registered log service's child for `module`, if any.
 * Children are cached per service instance.
 */
function resolveRegistered(module: string, cache: WeakMap<ILogService, ILogService>): ILogService | undefined {
  if (!hasServiceRegistry()) return undefined;
  const service = getServiceRegistry().tryGet(Services.Log);
  if (!service) return undefined;
  let child = cache.get(service);
  if (!child) {
    child = service.child(module);
    cache.set(service, child);
  }
  return child;
}

function createModuleLogger(module: string): ILogService {
  const prefix = `[${module}]`;
  const children = new WeakMap<ILogService, ILogService>();

  const write = (method: LogMethod, msg: string, data?: unknown): void => {
    const target = resolveRegistered(module, children);
    if (!target) {
      writeToConsole(method, prefix, msg, data);
    } else if (data !== undefined) {
      target[method](msg, data);
    } else {
      target[method](msg);
    }
  };

  return {
    debug: (msg, data) => write('debug', msg, data),
    info: (msg, data) => write('info', msg, data),
    warn: (msg, data) => write('warn', msg, data),
    error: (msg, data) => write('error', msg, data),
    child: (sub: string) => getLog(`${module}:${sub}`),
  };
}

/**
 * Get a scoped logger for a module.
 *
 * The logger resolves `Services.Log` on every call, so loggers created at
 * import time switch to the registered log service once startup registers it.
 */
export function getLog(module: string): ILogService {
  let logger = loggers.get(module);
  if (!logger) {
    logger = createModuleLogger(module);
    loggers.set(module, logger);
  }
  return logger;
}
