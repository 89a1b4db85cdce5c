/**
 * Dashboard Routes Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Hono } from 'hono';
import { requestId } from '../middleware/request-id.js';
import { errorHandler } from '../middleware/error-handler.js';
import { readEnvelope } from '../test-helpers.js';

const { mockCatalog } = vi.hoisted(() => ({
  mockCatalog: {
    getTableSummaries: vi.fn(),
    getDatabaseStats: vi.fn(),
  },
}));

vi.mock('../db/repositories/catalog.js', () => ({
  createCatalogRepository: () => mockCatalog,
}));

import { dashboardRoutes } from './dashboard.js';

function createApp() {
  const app = new Hono();
  app.use('*', requestId);
  app.route('/dashboard', dashboardRoutes);
  app.onError(errorHandler);
  return app;
}

describe('Dashboard Routes', () => {
  let app: Hono;

  beforeEach(() => {
    vi.clearAllMocks();
    app = createApp();
  });

  it('GET /dashboard returns table summaries', async () => {
    const tables = [
      { name: 'authors', rowCount: 12, columns: ['id', 'name'] },
      { name: 'books', rowCount: 40, columns: ['id', 'author_id', 'title'] },
    ];
    mockCatalog.getTableSummaries.mockResolvedValue(tables);

    const res = await app.request('/dashboard');

    expect(res.status).toBe(200);
    expect((await readEnvelope(res)).data).toEqual({ tables, total: 2 });
  });

  it('GET /dashboard/stats returns database statistics', async () => {
    const stats = {
      database: { size: '8 MB', sizeBytes: 8_388_608 },
      tables: [{ name: 'books', rowCount: 40, size: '64 kB' }],
      connections: { active: 3, max: 100 },
      version: 'PostgreSQL 16.2',
    };
    mockCatalog.getDatabaseStats.mockResolvedValue(stats);

    const res = await app.request('/dashboard/stats');

    expect(res.status).toBe(200);
    expect((await readEnvelope(res)).data).toEqual(stats);
  });

  it('answers 500 without leaking the message when the catalog query fails', async () => {
    mockCatalog.getTableSummaries.mockRejectedValue(new Error('Connection terminated unexpectedly'));

    const res = await app.request('/dashboard');

    expect(res.status).toBe(500);
    expect((await readEnvelope(res)).error).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
    });
  });
});
