/**
 * Maintenance Operation Routes
 */

import { Hono } from 'hono';
import { operationLock } from '../services/operation-status.js';
import { apiResponse } from './helpers.js';

export const operationRoutes = new Hono();

/**
 * GET /operations/status - Current or last backup, restore or archive run
 */
operationRoutes.get('/status', (c) => {
  return apiResponse(c, operationLock.getStatus());
});
