/**
 * Service Tokens - Typed keys for ServiceRegistry
 *
 * Usage:
 *   import { Services } from '@pgdesk/core';
 *   const log = registry.get(Services.Log); // typed as ILogService
 */

import { ServiceToken } from './registry.js';
import type { ILogService } from './log-service.js';

export const Services = {
  /** Structured logging */
  Log: new ServiceToken<ILogService>('log'),
} as const;
