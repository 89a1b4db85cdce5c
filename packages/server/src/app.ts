/**
 * Hono application setup
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { bodyLimit } from 'hono/body-limit';
import { logger } from 'hono/logger';
import { secureHeaders } from 'hono/secure-headers';

import { VERSION } from '@pgdesk/core';
import type { ServerConfig } from './types/index.js';
import { requestId, timing, adminGuard, errorHandler, notFoundHandler } from './middleware/index.js';
import {
  healthRoutes,
  dashboardRoutes,
  tableRoutes,
  queryRoutes,
  backupRoutes,
  archiveRoutes,
  operationRoutes,
} from './routes/index.js';
import { apiError, ERROR_CODES } from './routes/helpers.js';
import { createQueryService } from './services/query-service.js';
import {
  CORS_MAX_AGE_SECONDS,
  DEFAULT_BODY_SIZE_LIMIT,
  DEFAULT_HOST,
  DEFAULT_PORT,
} from './config/defaults.js';

/**
 * Comma-separated CORS_ORIGINS, empty when unset
 */
function parseCorsOrigins(value: string | undefined): string[] {
  return value
    ? value
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean)
    : [];
}

/**
 * Server configuration from the environment
 */
export function loadServerConfig(): ServerConfig {
  return {
    port: parseInt(process.env.PORT ?? '', 10) || DEFAULT_PORT,
    host: process.env.HOST || DEFAULT_HOST,
    corsOrigins: parseCorsOrigins(process.env.CORS_ORIGINS),
    bodySizeLimit: parseInt(process.env.BODY_SIZE_LIMIT ?? '', 10) || DEFAULT_BODY_SIZE_LIMIT,
  };
}

/**
 * Create the Hono application
 */
export function createApp(config: Partial<ServerConfig> = {}): Hono {
  const fullConfig: ServerConfig = { ...loadServerConfig(), ...config };
  const maxBodySize = fullConfig.bodySizeLimit ?? DEFAULT_BODY_SIZE_LIMIT;

  const app = new Hono();

  // Security headers (includes HSTS for HTTPS deployments)
  app.use(
    '*',
    secureHeaders({
      strictTransportSecurity: 'max-age=63072000; includeSubDomains; preload',
    })
  );

  // CORS - no origins unless CORS_ORIGINS lists them
  app.use(
    '*',
    cors({
      origin: fullConfig.corsOrigins ?? [],
      allowMethods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'X-Admin-Key', 'X-Request-ID'],
      exposeHeaders: ['X-Request-ID', 'X-Response-Time'],
      maxAge: CORS_MAX_AGE_SECONDS,
    })
  );

  // Request ID
  app.use('*', requestId);

  // Timing
  app.use('*', timing);

  // Logger (skip in test environment)
  if (process.env.NODE_ENV !== 'test') {
    app.use('*', logger());
  }

  // Body size limit (BODY_SIZE_LIMIT, default 1 MB)
  app.use(
    '/api/*',
    bodyLimit({
      maxSize: maxBodySize,
      onError: (c) =>
        apiError(
          c,
          {
            code: ERROR_CODES.PAYLOAD_TOO_LARGE,
            message: `Request body exceeds ${Math.round(maxBodySize / 1024 / 1024)} MB limit`,
          },
          413
        ),
    })
  );

  // Admin key (health routes are exempt)
  app.use('/api/v1/*', adminGuard);

  // Mount routes
  app.route('/health', healthRoutes);
  app.route('/api/v1/health', healthRoutes); // Also mount at /api/v1 for API consistency
  app.route('/api/v1/dashboard', dashboardRoutes);
  app.route('/api/v1/tables', tableRoutes);
  app.route('/api/v1/query', queryRoutes);
  app.route('/api/v1/backups', backupRoutes);
  app.route('/api/v1/archives', archiveRoutes);
  app.route('/api/v1/operations', operationRoutes);

  app.get('/', (c) => {
    return c.json({
      name: 'pgdesk',
      version: VERSION,
      documentation: '/api/v1',
    });
  });

  // API info
  app.get('/api/v1', (c) => {
    return c.json({
      version: 'v1',
      queryReadOnly: createQueryService().isReadOnly(),
      endpoints: {
        health: '/api/v1/health',
        dashboard: '/api/v1/dashboard',
        tables: '/api/v1/tables',
        query: '/api/v1/query',
        backups: '/api/v1/backups',
        archives: '/api/v1/archives',
        operations: '/api/v1/operations/status',
      },
    });
  });

  // Error handling
  app.onError(errorHandler);
  app.notFound(notFoundHandler);

  return app;
}

/**
 * Export types for Hono context
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}
