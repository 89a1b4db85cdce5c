/**
 * Backup Routes Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Hono } from 'hono';
import { CommandFailedError, NotFoundError, OperationInProgressError, ToolNotFoundError } from '@pgdesk/core';
import { requestId } from '../middleware/request-id.js';
import { errorHandler } from '../middleware/error-handler.js';
import { readEnvelope, jsonRequest } from '../test-helpers.js';

const { mockBackups } = vi.hoisted(() => ({
  mockBackups: {
    listBackups: vi.fn(),
    createBackup: vi.fn(),
    restoreBackup: vi.fn(),
    deleteBackup: vi.fn(),
  },
}));

vi.mock('../services/backup-service.js', () => ({
  createBackupService: () => mockBackups,
}));

import { backupRoutes } from './backups.js';

function createApp() {
  const app = new Hono();
  app.use('*', requestId);
  app.route('/backups', backupRoutes);
  app.onError(errorHandler);
  return app;
}

describe('Backup Routes', () => {
  let app: Hono;

  beforeEach(() => {
    vi.clearAllMocks();
    app = createApp();
  });

  describe('GET /backups', () => {
    it('lists backups with the default limit', async () => {
      const backups = [
        { name: 'shop.backup', size: 2048, modifiedAt: '2024-05-06T07:08:09.000Z', date: '2024-05-06 07:08:09' },
      ];
      mockBackups.listBackups.mockResolvedValue(backups);

      const res = await app.request('/backups');

      expect(res.status).toBe(200);
      expect((await readEnvelope(res)).data).toEqual({ backups, total: 1 });
      expect(mockBackups.listBackups).toHaveBeenCalledWith(10);
    });

    it('honors ?limit', async () => {
      mockBackups.listBackups.mockResolvedValue([]);
      await app.request('/backups?limit=25');
      expect(mockBackups.listBackups).toHaveBeenCalledWith(25);
    });
  });

  describe('POST /backups', () => {
    it('creates a backup and returns 201', async () => {
      const result = {
        fileName: 'nightly.backup',
        backupPath: '/srv/backups/nightly.backup',
        fileSize: 512,
        tables: ['books'],
        timestamp: '2024-05-06T07:08:09.000Z',
      };
      mockBackups.createBackup.mockResolvedValue(result);

      const res = await app.request('/backups', jsonRequest('POST', { name: 'nightly', tables: ['books'] }));

      expect(res.status).toBe(201);
      expect((await readEnvelope(res)).data).toEqual(result);
      expect(mockBackups.createBackup).toHaveBeenCalledWith({ name: 'nightly', tables: ['books'] });
    });

    it('accepts a request without a body', async () => {
      mockBackups.createBackup.mockResolvedValue({ fileName: 'shop_backup_20240506_070809.backup' });

      const res = await app.request('/backups', { method: 'POST' });

      expect(res.status).toBe(201);
      expect(mockBackups.createBackup).toHaveBeenCalledWith({});
    });

    it('returns 409 while another operation runs', async () => {
      mockBackups.createBackup.mockRejectedValue(new OperationInProgressError('restore'));

      const res = await app.request('/backups', jsonRequest('POST', {}));

      expect(res.status).toBe(409);
      expect((await readEnvelope(res)).error).toEqual({
        code: 'OPERATION_IN_PROGRESS',
        message: 'A restore operation is already in progress',
        details: { operation: 'restore' },
      });
    });

    it('returns 503 when pg_dump is not installed', async () => {
      mockBackups.createBackup.mockRejectedValue(new ToolNotFoundError('pg_dump'));

      const res = await app.request('/backups', jsonRequest('POST', {}));

      expect(res.status).toBe(503);
      expect((await readEnvelope(res)).error).toMatchObject({ code: 'TOOL_NOT_FOUND', details: { tool: 'pg_dump' } });
    });
  });

  describe('POST /backups/restore', () => {
    it('restores the named backup', async () => {
      const result = {
        message: 'Database restored successfully',
        backupPath: '/srv/backups/nightly.backup',
        timestamp: '2024-05-06T07:08:09.000Z',
        warnings: [],
      };
      mockBackups.restoreBackup.mockResolvedValue(result);

      const res = await app.request('/backups/restore', jsonRequest('POST', { fileName: 'nightly.backup' }));

      expect(res.status).toBe(200);
      expect((await readEnvelope(res)).data).toEqual(result);
      expect(mockBackups.restoreBackup).toHaveBeenCalledWith('nightly.backup');
    });

    it('requires a file name', async () => {
      const res = await app.request('/backups/restore', jsonRequest('POST', {}));

      expect(res.status).toBe(400);
      expect((await readEnvelope(res)).error?.code).toBe('VALIDATION_ERROR');
      expect(mockBackups.restoreBackup).not.toHaveBeenCalled();
    });

    it('reports restore errors with the command and warnings', async () => {
      mockBackups.restoreBackup.mockRejectedValue(
        new CommandFailedError('pg_restore: error: could not execute query', {
          command: 'pg_restore -h localhost /srv/backups/nightly.backup',
          warnings: ['pg_restore: warning: errors ignored on restore: 1'],
        })
      );

      const res = await app.request('/backups/restore', jsonRequest('POST', { fileName: 'nightly.backup' }));

      expect(res.status).toBe(500);
      expect((await readEnvelope(res)).error).toEqual({
        code: 'COMMAND_FAILED',
        message: 'pg_restore: error: could not execute query',
        details: {
          command: 'pg_restore -h localhost /srv/backups/nightly.backup',
          warnings: ['pg_restore: warning: errors ignored on restore: 1'],
        },
      });
    });
  });

  describe('DELETE /backups/:name', () => {
    it('deletes the backup', async () => {
      mockBackups.deleteBackup.mockResolvedValue({ deleted: 'nightly.backup' });

      const res = await app.request('/backups/nightly.backup', { method: 'DELETE' });

      expect(res.status).toBe(200);
      expect((await readEnvelope(res)).data).toEqual({ deleted: 'nightly.backup' });
      expect(mockBackups.deleteBackup).toHaveBeenCalledWith('nightly.backup');
    });

    it('returns 404 for a missing backup', async () => {
      mockBackups.deleteBackup.mockRejectedValue(new NotFoundError('Backup', 'gone.backup'));

      const res = await app.request('/backups/gone.backup', { method: 'DELETE' });

      expect(res.status).toBe(404);
      expect((await readEnvelope(res)).error?.message).toBe('Backup not found: gone.backup');
    });
  });
});
