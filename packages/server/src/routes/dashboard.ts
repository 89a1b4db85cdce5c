/**
 * Dashboard Routes
 *
 * Overview of every table plus database-wide statistics.
 */

import { Hono } from 'hono';
import { createCatalogRepository } from '../db/repositories/catalog.js';
import { apiResponse } from './helpers.js';

export const dashboardRoutes = new Hono();

/**
 * GET /dashboard - Tables with row counts and column names
 */
dashboardRoutes.get('/', async (c) => {
  const tables = await createCatalogRepository().getTableSummaries();
  return apiResponse(c, { tables, total: tables.length });
});

/**
 * GET /dashboard/stats - Size, largest tables, connections and version
 */
dashboardRoutes.get('/stats', async (c) => {
  return apiResponse(c, await createCatalogRepository().getDatabaseStats());
});
