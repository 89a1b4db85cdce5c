/**
 * Health check routes
 */

import { Hono } from 'hono';
import { VERSION, getErrorMessage } from '@pgdesk/core';
import type { HealthCheck, HealthStatus } from '../types/index.js';
import { getAdapterSync } from '../db/adapters/index.js';
import { getDatabaseConfig } from '../db/adapters/types.js';
import { apiResponse, apiError, ERROR_CODES } from './helpers.js';

const startTime = Date.now();

export const healthRoutes = new Hono();

/**
 * Ping the database through the global adapter.
 */
async function checkDatabase(): Promise<HealthCheck> {
  const { postgresHost } = getDatabaseConfig();
  try {
    const adapter = getAdapterSync();
    if (!adapter.isConnected()) {
      return { name: 'database', status: 'fail', message: 'POSTGRES not connected' };
    }
    await adapter.queryOne('SELECT 1 AS ok');
    return { name: 'database', status: 'pass', message: `POSTGRES connected (${postgresHost})` };
  } catch (error) {
    return { name: 'database', status: 'fail', message: getErrorMessage(error, 'POSTGRES not connected') };
  }
}

/**
 * Basic health check with database connectivity
 */
healthRoutes.get('/', async (c) => {
  const checks: HealthCheck[] = [
    { name: 'core', status: 'pass', message: 'Core module loaded' },
    await checkDatabase(),
    {
      name: 'admin',
      status: process.env.ADMIN_API_KEY ? 'pass' : 'warn',
      message: process.env.ADMIN_API_KEY
        ? 'Admin key configured'
        : 'ADMIN_API_KEY not set - console API disabled',
    },
  ];

  const health: HealthStatus = {
    status: checks.every((check) => check.status === 'pass') ? 'healthy' : 'degraded',
    version: VERSION,
    uptime: (Date.now() - startTime) / 1000,
    checks,
  };
  return apiResponse(c, health);
});

/**
 * Liveness check for orchestrators
 */
healthRoutes.get('/live', (c) => {
  return apiResponse(c, { status: 'ok' });
});

/**
 * Readiness check - ready once the database answers
 */
healthRoutes.get('/ready', async (c) => {
  const database = await checkDatabase();
  if (database.status !== 'pass') {
    return apiError(
      c,
      { code: ERROR_CODES.SERVICE_UNAVAILABLE, message: database.message ?? 'Database unavailable' },
      503
    );
  }
  return apiResponse(c, { status: 'ok' });
});
