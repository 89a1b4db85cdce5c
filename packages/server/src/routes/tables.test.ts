/**
 * Table Routes Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Hono } from 'hono';
import { DependencyConflictError, NotFoundError, QueryRejectedError } from '@pgdesk/core';
import { requestId } from '../middleware/request-id.js';
import { errorHandler } from '../middleware/error-handler.js';
import { readEnvelope, jsonRequest } from '../test-helpers.js';

const { mockCatalog, mockRecords } = vi.hoisted(() => ({
  mockCatalog: {
    listTables: vi.fn(),
    requireTable: vi.fn(),
    getTableColumns: vi.fn(),
    getPrimaryKey: vi.fn(),
  },
  mockRecords: {
    getTablePage: vi.fn(),
    getRecordById: vi.fn(),
    insertRecord: vi.fn(),
    updateRecordById: vi.fn(),
    updateWhere: vi.fn(),
    deleteRecordById: vi.fn(),
    deleteWhere: vi.fn(),
  },
}));

vi.mock('../db/repositories/catalog.js', () => ({
  createCatalogRepository: () => mockCatalog,
}));

vi.mock('../db/repositories/records.js', () => ({
  createRecordsRepository: () => mockRecords,
}));

import { tableRoutes } from './tables.js';

function createApp() {
  const app = new Hono();
  app.use('*', requestId);
  app.route('/tables', tableRoutes);
  app.onError(errorHandler);
  return app;
}

describe('Table Routes', () => {
  let app: Hono;

  beforeEach(() => {
    vi.clearAllMocks();
    app = createApp();
  });

  describe('GET /tables', () => {
    it('lists table names', async () => {
      mockCatalog.listTables.mockResolvedValue(['authors', 'books']);

      const res = await app.request('/tables');

      expect(res.status).toBe(200);
      const json = await readEnvelope(res);
      expect(json.success).toBe(true);
      expect(json.data).toEqual({ tables: ['authors', 'books'], total: 2 });
    });
  });

  describe('GET /tables/:table/columns', () => {
    it('returns columns and the primary key', async () => {
      const columns = [{ name: 'id', type: 'integer', nullable: false, default: null }];
      mockCatalog.requireTable.mockResolvedValue('books');
      mockCatalog.getTableColumns.mockResolvedValue(columns);
      mockCatalog.getPrimaryKey.mockResolvedValue('id');

      const res = await app.request('/tables/books/columns');

      expect(res.status).toBe(200);
      expect((await readEnvelope(res)).data).toEqual({ table: 'books', columns, primaryKey: 'id' });
    });

    it('returns 404 for an unknown table', async () => {
      mockCatalog.requireTable.mockRejectedValue(new NotFoundError('Table', 'ghosts'));

      const res = await app.request('/tables/ghosts/columns');

      expect(res.status).toBe(404);
      const json = await readEnvelope(res);
      expect(json.error).toEqual({
        code: 'NOT_FOUND',
        message: 'Table not found: ghosts',
        details: { resource: 'Table', id: 'ghosts' },
      });
      expect(mockCatalog.getTableColumns).not.toHaveBeenCalled();
    });
  });

  describe('GET /tables/:table/rows', () => {
    it('passes page and page size through', async () => {
      mockRecords.getTablePage.mockResolvedValue({ totalCount: 0, data: [] });

      const res = await app.request('/tables/books/rows?page=2&pageSize=50');

      expect(res.status).toBe(200);
      expect(mockRecords.getTablePage).toHaveBeenCalledWith('books', 2, 50);
    });

    it('uses defaults and clamps out-of-range values', async () => {
      mockRecords.getTablePage.mockResolvedValue({ totalCount: 0, data: [] });

      await app.request('/tables/books/rows');
      await app.request('/tables/books/rows?page=0&pageSize=99999');

      expect(mockRecords.getTablePage.mock.calls).toEqual([
        ['books', 1, 200],
        ['books', 1, 10_000],
      ]);
    });
  });

  describe('POST /tables/:table/rows', () => {
    it('inserts a record and returns 201', async () => {
      mockRecords.insertRecord.mockResolvedValue({ id: 1, title: 'Dune' });

      const res = await app.request('/tables/books/rows', jsonRequest('POST', { title: 'Dune' }));

      expect(res.status).toBe(201);
      expect((await readEnvelope(res)).data).toEqual({ id: 1, title: 'Dune' });
      expect(mockRecords.insertRecord).toHaveBeenCalledWith('books', { title: 'Dune' });
    });

    it('rejects malformed JSON', async () => {
      const res = await app.request('/tables/books/rows', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: '{"title":',
      });

      expect(res.status).toBe(400);
      expect((await readEnvelope(res)).error).toEqual({
        code: 'BAD_REQUEST',
        message: 'Invalid JSON in request body',
      });
    });

    it('rejects a body that is not an object', async () => {
      const res = await app.request('/tables/books/rows', jsonRequest('POST', ['Dune']));

      expect(res.status).toBe(400);
      expect((await readEnvelope(res)).error?.code).toBe('VALIDATION_ERROR');
      expect(mockRecords.insertRecord).not.toHaveBeenCalled();
    });

    it('maps constraint violations to 409', async () => {
      mockRecords.insertRecord.mockRejectedValue(
        new QueryRejectedError('duplicate key value violates unique constraint "books_pkey"', '23505')
      );

      const res = await app.request('/tables/books/rows', jsonRequest('POST', { id: 1 }));

      expect(res.status).toBe(409);
      expect((await readEnvelope(res)).error).toEqual({
        code: 'QUERY_REJECTED',
        message: 'duplicate key value violates unique constraint "books_pkey"',
        details: { sqlState: '23505' },
      });
    });
  });

  describe('PATCH /tables/:table/rows', () => {
    it('updates rows matching the condition', async () => {
      mockRecords.updateWhere.mockResolvedValue({ updatedCount: 2, rows: [] });

      const res = await app.request(
        '/tables/books/rows',
        jsonRequest('PATCH', { set: { in_print: 'false' }, where: { author_id: '4' } })
      );

      expect(res.status).toBe(200);
      expect((await readEnvelope(res)).data).toEqual({ updatedCount: 2, rows: [] });
      expect(mockRecords.updateWhere).toHaveBeenCalledWith('books', { in_print: 'false' }, { author_id: '4' });
    });

    it('requires both set and where', async () => {
      const res = await app.request('/tables/books/rows', jsonRequest('PATCH', { set: { title: 'x' } }));

      expect(res.status).toBe(400);
      expect((await readEnvelope(res)).error?.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('DELETE /tables/:table/rows', () => {
    it('deletes rows matching the condition', async () => {
      mockRecords.deleteWhere.mockResolvedValue({ deletedCount: 1, rows: [{ id: 3 }] });

      const res = await app.request('/tables/books/rows', jsonRequest('DELETE', { where: { id: 3 }, force: true }));

      expect(res.status).toBe(200);
      expect(mockRecords.deleteWhere).toHaveBeenCalledWith('books', { id: 3 }, { force: true });
    });

    it('returns 409 with the blocking dependencies', async () => {
      mockRecords.deleteWhere.mockRejectedValue(new DependencyConflictError({ 'loans.book_id': 2 }));

      const res = await app.request('/tables/books/rows', jsonRequest('DELETE', { where: { id: 3 } }));

      expect(res.status).toBe(409);
      expect((await readEnvelope(res)).error).toEqual({
        code: 'DEPENDENCY_CONFLICT',
        message: 'Cannot delete records because dependent data exists',
        details: { dependencies: { 'loans.book_id': 2 } },
      });
    });
  });

  describe('/tables/:table/rows/:id', () => {
    it('returns a record', async () => {
      mockRecords.getRecordById.mockResolvedValue({ id: 7, title: 'Emma' });

      const res = await app.request('/tables/books/rows/7');

      expect(res.status).toBe(200);
      expect((await readEnvelope(res)).data).toEqual({ id: 7, title: 'Emma' });
      expect(mockRecords.getRecordById).toHaveBeenCalledWith('books', '7');
    });

    it('returns 404 when the record does not exist', async () => {
      mockRecords.getRecordById.mockResolvedValue(null);

      const res = await app.request('/tables/books/rows/7');

      expect(res.status).toBe(404);
      expect((await readEnvelope(res)).error).toEqual({ code: 'NOT_FOUND', message: 'Record not found: 7' });
    });

    it('updates a record', async () => {
      mockRecords.updateRecordById.mockResolvedValue({ id: 7, title: 'Persuasion' });

      const res = await app.request('/tables/books/rows/7', jsonRequest('PUT', { title: 'Persuasion' }));

      expect(res.status).toBe(200);
      expect(mockRecords.updateRecordById).toHaveBeenCalledWith('books', '7', { title: 'Persuasion' });
    });

    it('deletes a record, forcing only when asked', async () => {
      mockRecords.deleteRecordById.mockResolvedValue({ deletedCount: 1 });

      await app.request('/tables/books/rows/7', jsonRequest('DELETE', {}));
      await app.request('/tables/books/rows/7?force=true', jsonRequest('DELETE', {}));

      expect(mockRecords.deleteRecordById.mock.calls).toEqual([
        ['books', '7', { force: false }],
        ['books', '7', { force: true }],
      ]);
    });
  });
});
