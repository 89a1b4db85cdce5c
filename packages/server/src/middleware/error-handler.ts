/**
 * Global error handler middleware
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { isAppError } from '@pgdesk/core';
import type { ApiResponse } from '../types/index.js';
import { ERROR_CODES } from '../routes/helpers.js';
import { getLog } from '../services/log.js';

const log = getLog('ErrorHandler');

/**
 * Map HTTP status to error code
 */
function statusToErrorCode(status: number): string {
  switch (status) {
    case 400:
      return ERROR_CODES.BAD_REQUEST;
    case 403:
      return ERROR_CODES.FORBIDDEN;
    case 404:
      return ERROR_CODES.NOT_FOUND;
    case 503:
      return ERROR_CODES.SERVICE_UNAVAILABLE;
    default:
      return ERROR_CODES.INTERNAL_ERROR;
  }
}

function envelope(c: Context, error: NonNullable<ApiResponse['error']>): ApiResponse {
  return {
    success: false,
    error,
    meta: {
      requestId: c.get('requestId') ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };
}

/**
 * Global error handler
 */
export function errorHandler(err: Error, c: Context): Response {
  const requestId = c.get('requestId') ?? 'unknown';

  // Service errors carry their own status and code
  if (isAppError(err)) {
    if (err.statusCode >= 500) {
      log.error(`[${requestId}] ${err.code}: ${err.message}`);
    }
    const details = err.details();
    return c.json(
      envelope(c, { code: err.code, message: err.message, ...(details ? { details } : {}) }),
      err.statusCode
    );
  }

  // Handle HTTP exceptions (from Hono)
  if (err instanceof HTTPException) {
    return c.json(envelope(c, { code: statusToErrorCode(err.status), message: err.message }), err.status);
  }

  // Handle JSON parse errors (malformed request body)
  if (err instanceof SyntaxError && err.message.includes('JSON')) {
    return c.json(envelope(c, { code: ERROR_CODES.BAD_REQUEST, message: 'Invalid JSON in request body' }), 400);
  }

  // Handle validation errors thrown as plain Errors (from validateBody)
  if (err.message?.startsWith('Validation failed:')) {
    return c.json(envelope(c, { code: ERROR_CODES.VALIDATION_ERROR, message: err.message }), 400);
  }

  log.error(`[${requestId}] Unexpected error:`, err);

  return c.json(
    envelope(c, {
      code: ERROR_CODES.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
      // Only expose error message in development, never stack traces
      details: process.env.NODE_ENV === 'development' ? { message: err.message } : undefined,
    }),
    500
  );
}

/**
 * Not found handler
 */
export function notFoundHandler(c: Context): Response {
  return c.json(
    envelope(c, {
      code: ERROR_CODES.NOT_FOUND,
      message: `Route not found: ${c.req.method} ${c.req.path.replace(/[^\w/.\-~%]/g, '')}`,
    }),
    404
  );
}
