/**
 * Backup Routes
 *
 * pg_dump backups and pg_restore restores. Both run under the maintenance
 * lock and answer once the tool has finished.
 */

import { Hono } from 'hono';
import { createBackupService } from '../services/backup-service.js';
import { MAINTENANCE_LIST_LIMIT } from '../config/defaults.js';
import { validateBody, createBackupSchema, restoreBackupSchema } from '../middleware/validation.js';
import { apiResponse, getIntParam } from './helpers.js';

export const backupRoutes = new Hono();

/**
 * GET /backups - Backup files, newest first
 */
backupRoutes.get('/', async (c) => {
  const limit = getIntParam(c, 'limit', MAINTENANCE_LIST_LIMIT, 1, 1000);
  const backups = await createBackupService().listBackups(limit);
  return apiResponse(c, { backups, total: backups.length });
});

/**
 * POST /backups - Create a backup of the whole database or some tables
 */
backupRoutes.post('/', async (c) => {
  const body = validateBody(createBackupSchema, await c.req.json().catch(() => ({})));
  const result = await createBackupService().createBackup(body);
  return apiResponse(c, result, 201);
});

/**
 * POST /backups/restore - Replace the public schema with a backup
 */
backupRoutes.post('/restore', async (c) => {
  const { fileName } = validateBody(restoreBackupSchema, await c.req.json());
  const result = await createBackupService().restoreBackup(fileName);
  return apiResponse(c, result);
});

/**
 * DELETE /backups/:name - Remove a backup file
 */
backupRoutes.delete('/:name', async (c) => {
  const result = await createBackupService().deleteBackup(c.req.param('name'));
  return apiResponse(c, result);
});
