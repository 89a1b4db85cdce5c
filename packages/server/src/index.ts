/**
 * @pgdesk/server
 *
 * HTTP API for the pgdesk PostgreSQL console
 *
 * @packageDocumentation
 */

// App
export { createApp, loadServerConfig } from './app.js';

// Types
export type {
  ApiResponse,
  ApiError,
  ResponseMeta,
  HealthStatus,
  HealthCheck,
  ServerConfig,
} from './types/index.js';

// Middleware
export { requestId, timing, adminGuard, errorHandler, notFoundHandler } from './middleware/index.js';

// Routes
export {
  healthRoutes,
  dashboardRoutes,
  tableRoutes,
  queryRoutes,
  backupRoutes,
  archiveRoutes,
  operationRoutes,
} from './routes/index.js';

// Database
export { initializeAdapter, closeAdapter, getAdapterSync, PostgresAdapter } from './db/adapters/index.js';
export { getDatabaseConfig, type DatabaseAdapter, type DatabaseConfig } from './db/adapters/types.js';
export { CatalogRepository, createCatalogRepository, type DatabaseStats } from './db/repositories/catalog.js';
export { RecordsRepository, createRecordsRepository } from './db/repositories/records.js';

// Services
export { createLogService, LogService, type LogServiceOptions } from './services/log-service-impl.js';
export { QueryService, createQueryService, type QueryOutcome } from './services/query-service.js';
export { BackupService, createBackupService } from './services/backup-service.js';
export { ArchiveService, createArchiveService } from './services/archive-service.js';
export { OperationLock, operationLock, type OperationStatus } from './services/operation-status.js';

// Paths
export { getBackupDir, getArchiveDir } from './paths/index.js';
