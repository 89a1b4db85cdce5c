/**
 * Services exports
 */

// Service Registry (typed DI container)
export {
  ServiceToken,
  ServiceRegistry,
  initServiceRegistry,
  getServiceRegistry,
  hasServiceRegistry,
  resetServiceRegistry,
  type Disposable,
} from './registry.js';

// Service Tokens
export { Services } from './tokens.js';

// Logging
export { LOG_LEVELS, isLogLevel, type ILogService, type LogLevel } from './log-service.js';
export { getLog } from './get-log.js';

// Error Utilities
export { getErrorMessage, getErrorCode } from './error-utils.js';
