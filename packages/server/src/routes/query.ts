/**
 * Query Console Routes
 */

import { Hono } from 'hono';
import { createQueryService } from '../services/query-service.js';
import { validateBody, executeQuerySchema } from '../middleware/validation.js';
import { apiResponse, apiError, ERROR_CODES } from './helpers.js';

export const queryRoutes = new Hono();

/**
 * POST /query - Run ad-hoc SQL
 *
 * Body: { query, params? } where params is a positional array ($1, $2, ...)
 * or an object bound to :name placeholders.
 */
queryRoutes.post('/', async (c) => {
  const { query, params } = validateBody(executeQuerySchema, await c.req.json());
  const outcome = await createQueryService().executeSql(query, params);

  if (!outcome.success) {
    const { success: _success, error, ...details } = outcome;
    return apiError(c, { code: ERROR_CODES.QUERY_FAILED, message: error, details }, 400);
  }
  return apiResponse(c, outcome);
});
