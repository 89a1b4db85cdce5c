/**
 * Archive Routes
 */

import { Hono } from 'hono';
import { createArchiveService } from '../services/archive-service.js';
import { MAINTENANCE_LIST_LIMIT } from '../config/defaults.js';
import { validateBody, archiveTablesSchema } from '../middleware/validation.js';
import { apiResponse, getIntParam } from './helpers.js';

export const archiveRoutes = new Hono();

/**
 * GET /archives - Archive folders, newest first
 */
archiveRoutes.get('/', async (c) => {
  const limit = getIntParam(c, 'limit', MAINTENANCE_LIST_LIMIT, 1, 1000);
  const archives = await createArchiveService().listArchives(limit);
  return apiResponse(c, { archives, total: archives.length });
});

/**
 * POST /archives - Save tables as JSON plus pg_dump, then empty them
 */
archiveRoutes.post('/', async (c) => {
  const { tables, reason, purgeDependents } = validateBody(archiveTablesSchema, await c.req.json());
  const report = await createArchiveService().archiveTables(tables, reason, { purgeDependents });
  return apiResponse(c, report, 201);
});

/**
 * DELETE /archives/:name - Remove an archive folder
 */
archiveRoutes.delete('/:name', async (c) => {
  const result = await createArchiveService().deleteArchive(c.req.param('name'));
  return apiResponse(c, result);
});
