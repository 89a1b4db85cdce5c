/**
 * Table Routes
 *
 * Schema introspection and generic record CRUD for any table in `public`.
 * Unknown tables and columns are rejected by the repositories.
 */

import { Hono } from 'hono';
import { createCatalogRepository } from '../db/repositories/catalog.js';
import { createRecordsRepository } from '../db/repositories/records.js';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from '../config/defaults.js';
import {
  validateBody,
  recordValuesSchema,
  updateWhereSchema,
  deleteWhereSchema,
} from '../middleware/validation.js';
import { apiResponse, apiError, getIntParam, ERROR_CODES, sanitizeId } from './helpers.js';

export const tableRoutes = new Hono();

// ============================================================================
// Schema
// ============================================================================

/**
 * GET /tables - Table names, sorted
 */
tableRoutes.get('/', async (c) => {
  const tables = await createCatalogRepository().listTables();
  return apiResponse(c, { tables, total: tables.length });
});

/**
 * GET /tables/:table/columns - Columns in ordinal order plus the primary key
 */
tableRoutes.get('/:table/columns', async (c) => {
  const table = c.req.param('table');
  const catalog = createCatalogRepository();
  await catalog.requireTable(table);
  const [columns, primaryKey] = await Promise.all([
    catalog.getTableColumns(table),
    catalog.getPrimaryKey(table),
  ]);
  return apiResponse(c, { table, columns, primaryKey });
});

// ============================================================================
// Rows
// ============================================================================

/**
 * GET /tables/:table/rows - One page of rows
 *
 * Query params:
 * - page: 1-based page number (default 1)
 * - pageSize: rows per page (default 200, max 10000)
 */
tableRoutes.get('/:table/rows', async (c) => {
  const page = getIntParam(c, 'page', 1, 1);
  const pageSize = getIntParam(c, 'pageSize', DEFAULT_PAGE_SIZE, 1, MAX_PAGE_SIZE);
  const result = await createRecordsRepository().getTablePage(c.req.param('table'), page, pageSize);
  return apiResponse(c, result);
});

/**
 * POST /tables/:table/rows - Insert a record
 */
tableRoutes.post('/:table/rows', async (c) => {
  const body = validateBody(recordValuesSchema, await c.req.json());
  const record = await createRecordsRepository().insertRecord(c.req.param('table'), body);
  return apiResponse(c, record, 201);
});

/**
 * PATCH /tables/:table/rows - Update every row matching `where`
 */
tableRoutes.patch('/:table/rows', async (c) => {
  const { set, where } = validateBody(updateWhereSchema, await c.req.json());
  const result = await createRecordsRepository().updateWhere(c.req.param('table'), set, where);
  return apiResponse(c, result);
});

/**
 * DELETE /tables/:table/rows - Delete every row matching `where`
 */
tableRoutes.delete('/:table/rows', async (c) => {
  const { where, force } = validateBody(deleteWhereSchema, await c.req.json());
  const result = await createRecordsRepository().deleteWhere(c.req.param('table'), where, { force });
  return apiResponse(c, result);
});

/**
 * GET /tables/:table/rows/:id - One record by primary key
 */
tableRoutes.get('/:table/rows/:id', async (c) => {
  const id = c.req.param('id');
  const record = await createRecordsRepository().getRecordById(c.req.param('table'), id);
  if (!record) {
    return apiError(c, { code: ERROR_CODES.NOT_FOUND, message: `Record not found: ${sanitizeId(id)}` }, 404);
  }
  return apiResponse(c, record);
});

/**
 * PUT /tables/:table/rows/:id - Update one record by primary key
 */
tableRoutes.put('/:table/rows/:id', async (c) => {
  const body = validateBody(recordValuesSchema, await c.req.json());
  const record = await createRecordsRepository().updateRecordById(c.req.param('table'), c.req.param('id'), body);
  return apiResponse(c, record);
});

/**
 * DELETE /tables/:table/rows/:id - Delete one record; ?force=true skips the dependency check
 */
tableRoutes.delete('/:table/rows/:id', async (c) => {
  const force = c.req.query('force') === 'true';
  const result = await createRecordsRepository().deleteRecordById(c.req.param('table'), c.req.param('id'), {
    force,
  });
  return apiResponse(c, result);
});
