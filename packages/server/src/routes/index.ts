/**
 * Route exports
 */

export { healthRoutes } from './health.js';
export { dashboardRoutes } from './dashboard.js';
export { tableRoutes } from './tables.js';
export { queryRoutes } from './query.js';
export { backupRoutes } from './backups.js';
export { archiveRoutes } from './archives.js';
export { operationRoutes } from './operations.js';
