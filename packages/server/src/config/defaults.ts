/**
 * Server Default Configuration
 *
 * Named constants for tunable infrastructure values.
 * Import these instead of using inline magic numbers.
 *
 * Override via environment variables where noted.
 */

// ============================================================================
// Database
// ============================================================================

/** Maximum number of connections in the Postgres pool (POSTGRES_POOL_SIZE) */
export const DB_POOL_MAX = 10;

/** Idle connection timeout before closing (ms) */
export const DB_IDLE_TIMEOUT_MS = 30_000;

/** Connection acquisition timeout (ms) */
export const DB_CONNECT_TIMEOUT_MS = 5_000;

/** Default PostgreSQL port */
export const DB_DEFAULT_PORT = 5432;

// ============================================================================
// HTTP
// ============================================================================

/** Default listen port (PORT) */
export const DEFAULT_PORT = 8080;

/** Default bind address (HOST) */
export const DEFAULT_HOST = '127.0.0.1';

/** Default request body limit in bytes (BODY_SIZE_LIMIT) */
export const DEFAULT_BODY_SIZE_LIMIT = 1_048_576;

/** CORS preflight cache (seconds) */
export const CORS_MAX_AGE_SECONDS = 86_400;

// ============================================================================
// Table browsing
// ============================================================================

/** Rows per page when none is requested */
export const DEFAULT_PAGE_SIZE = 200;

/** Upper bound for a requested page size */
export const MAX_PAGE_SIZE = 10_000;

// ============================================================================
// Maintenance
// ============================================================================

/** Default backup directory, relative to the working directory (BACKUP_DIR) */
export const DEFAULT_BACKUP_DIR = 'backups';

/** Default archive directory, relative to the working directory (ARCHIVE_DIR) */
export const DEFAULT_ARCHIVE_DIR = 'archives';

/** Entries returned by backup and archive listings */
export const MAINTENANCE_LIST_LIMIT = 10;

/** Report file written into every archive folder */
export const ARCHIVE_REPORT_FILE = 'archive_report.json';

/** Lines of tool output kept on the operation status */
export const OPERATION_OUTPUT_MAX_LINES = 200;

/** Grace period before a hung shutdown is forced (ms) */
export const SHUTDOWN_TIMEOUT_MS = 5_000;
