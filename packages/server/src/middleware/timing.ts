/**
 * Request timing middleware
 * Reports handler time in X-Response-Time
 */

import { createMiddleware } from 'hono/factory';

export const timing = createMiddleware(async (c, next) => {
  const start = performance.now();
  await next();
  c.header('X-Response-Time', `${(performance.now() - start).toFixed(2)}ms`);
});
