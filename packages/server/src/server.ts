/**
 * HTTP Server entry point
 *
 * Loads .env, connects to PostgreSQL and serves the console API.
 */

// Load .env file FIRST before any other imports
import { config } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { existsSync } from 'node:fs';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Try multiple locations for .env file
const envPaths = [
  resolve(__dirname, '..', '..', '..', '.env'), // monorepo root from src/
  resolve(__dirname, '..', '.env'), // packages/server/.env
  resolve(process.cwd(), '.env'), // current working directory
];

for (const envPath of envPaths) {
  if (existsSync(envPath)) {
    config({ path: envPath });
    console.log(`[Config] Loaded .env from: ${envPath}`);
    break;
  }
}

import { serve } from '@hono/node-server';
import { initServiceRegistry, Services, getErrorMessage } from '@pgdesk/core';
import { createApp, loadServerConfig } from './app.js';
import { initializeAdapter, closeAdapter } from './db/adapters/index.js';
import { getDatabaseConfig } from './db/adapters/types.js';
import { getArchiveDir, getBackupDir } from './paths/index.js';
import { createLogService } from './services/log-service-impl.js';
import { SHUTDOWN_TIMEOUT_MS } from './config/defaults.js';
import { getLog } from './services/log.js';

const bootLog = getLog('Server');

/**
 * Start the server
 */
async function main(): Promise<void> {
  // ── ServiceRegistry ──────────────────────────────────────────────────────
  const registry = initServiceRegistry();

  // Log service first, everything else can use it
  const log = createLogService();
  registry.register(Services.Log, log);
  log.info('ServiceRegistry initialized', { services: registry.list() });

  // Initialize PostgreSQL database adapter (REQUIRED)
  const dbConfig = getDatabaseConfig();
  log.info(`Connecting to PostgreSQL at ${dbConfig.postgresHost}:${dbConfig.postgresPort}/${dbConfig.postgresDatabase}`);
  try {
    const adapter = await initializeAdapter(dbConfig);
    log.info(`PostgreSQL connected: ${adapter.isConnected()}`);
  } catch (error) {
    log.error('PostgreSQL connection failed', { error: getErrorMessage(error) });
    log.error('Make sure PostgreSQL is running and DATABASE_URL or POSTGRES_* is configured.');
    process.exit(1);
  }

  // Security warnings at startup
  if (!process.env.ADMIN_API_KEY) {
    log.warn('ADMIN_API_KEY is not set: every /api/v1 endpoint except health answers 503.');
  }

  const serverConfig = loadServerConfig();
  if (serverConfig.corsOrigins?.includes('*')) {
    log.warn('CORS is set to wildcard (*). Any website can make API requests.');
  }

  const app = createApp(serverConfig);
  const { port, host } = serverConfig;

  log.info('Starting pgdesk...', {
    port,
    host,
    backupDir: getBackupDir(),
    archiveDir: getArchiveDir(),
    queryReadOnly: process.env.QUERY_READ_ONLY === 'true',
  });

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    log.info(`Server running at http://${info.address}:${info.port}`);
    log.info(`API docs: http://${info.address}:${info.port}/api/v1`);
    log.info(`Health: http://${info.address}:${info.port}/health`);
  });

  // ── Graceful Shutdown ─────────────────────────────────────────────────────
  let isShuttingDown = false;

  async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) return;
    isShuttingDown = true;

    log.info(`Received ${signal}, shutting down gracefully...`);

    // Force exit if something hangs
    setTimeout(() => process.exit(0), SHUTDOWN_TIMEOUT_MS).unref();

    // 1. Stop accepting new HTTP connections
    server.close();

    // 2. Close DB connection pool
    try {
      await closeAdapter();
    } catch (e) {
      log.warn('DB close error', { error: getErrorMessage(e) });
    }

    // 3. Dispose registered services
    const errors = await registry.dispose();
    for (const e of errors) {
      log.warn('Service dispose error', { error: getErrorMessage(e) });
    }

    log.info('Cleanup complete, exiting.');
  }

  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

  // ── Global Error Handlers ─────────────────────────────────────────────────
  process.on('unhandledRejection', (reason) => {
    log.error('Unhandled Promise Rejection', { reason: getErrorMessage(reason) });
  });

  process.on('uncaughtException', (error) => {
    log.error('Uncaught Exception, shutting down', { error: error.message, stack: error.stack });
    void gracefulShutdown('uncaughtException').finally(() => process.exit(1));
  });
}

// Run server
main().catch((err: unknown) => {
  bootLog.error('Fatal: server startup failed', {
    error: getErrorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  process.exit(1);
});
