/**
 * Middleware exports
 */

export { requestId } from './request-id.js';
export { timing } from './timing.js';
export { adminGuard } from './admin-guard.js';
export { errorHandler, notFoundHandler } from './error-handler.js';
export {
  validateBody,
  recordValuesSchema,
  updateWhereSchema,
  deleteWhereSchema,
  executeQuerySchema,
  createBackupSchema,
  restoreBackupSchema,
  archiveTablesSchema,
} from './validation.js';
