/**
 * Logging Utility. Re-exports from @pgdesk/core
 *
 * Usage:
 *   import { getLog } from '../services/log.js';
 *   const log = getLog('Backups');
 *   log.info('Backup created', { fileName });
 */

export { getLog } from '@pgdesk/core';
