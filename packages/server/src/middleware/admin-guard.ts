/**
 * Admin guard middleware
 *
 * Every console endpoint requires ADMIN_API_KEY to be configured and sent
 * back in the X-Admin-Key header. Health routes are exempt.
 */

import { createMiddleware } from 'hono/factory';
import { HTTPException } from 'hono/http-exception';
import { safeKeyCompare } from '../routes/helpers.js';

const EXEMPT_PATHS = ['/health', '/api/v1/health'];

export const adminGuard = createMiddleware(async (c, next) => {
  const path = c.req.path;
  if (EXEMPT_PATHS.some((p) => path === p || path.startsWith(`${p}/`))) {
    await next();
    return;
  }

  const adminKey = process.env.ADMIN_API_KEY;
  if (!adminKey) {
    throw new HTTPException(503, {
      message: 'Console operations require ADMIN_API_KEY to be configured',
    });
  }

  if (!safeKeyCompare(c.req.header('X-Admin-Key'), adminKey)) {
    throw new HTTPException(403, {
      message: 'Valid X-Admin-Key header required',
    });
  }

  await next();
});
