/**
 * Route Helpers
 *
 * Shared utilities for Hono route handlers.
 */

import { timingSafeEqual } from 'node:crypto';
import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { ApiResponse } from '../types/index.js';
import { ERROR_CODES, type ErrorCode } from './error-codes.js';

// Re-export error codes for convenience
export { ERROR_CODES, type ErrorCode };

/**
 * Timing-safe comparison of two strings (e.g. admin keys).
 * Returns false if either value is undefined/empty or lengths differ.
 */
export function safeKeyCompare(a: string | undefined, b: string | undefined): boolean {
  if (!a || !b) return false;
  const aBuf = Buffer.from(a);
  const bBuf = Buffer.from(b);
  if (aBuf.length !== bBuf.length) return false;
  return timingSafeEqual(aBuf, bBuf);
}

/**
 * Parse integer query parameter with default and optional min/max bounds.
 *
 * @param c - Hono context
 * @param name - Query parameter name
 * @param defaultValue - Default value if parameter is missing
 * @param min - Minimum allowed value (optional)
 * @param max - Maximum allowed value (optional)
 */
export function getIntParam(
  c: Context,
  name: string,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  let value = parseInt(c.req.query(name) ?? String(defaultValue), 10);
  if (Number.isNaN(value)) value = defaultValue;

  if (min !== undefined) value = Math.max(min, value);
  if (max !== undefined) value = Math.min(max, value);

  return value;
}

/**
 * Build and return a success API response with standard meta envelope.
 */
export function apiResponse<T>(c: Context, data: T, status?: ContentfulStatusCode) {
  const response: ApiResponse<T> = {
    success: true,
    data,
    meta: {
      requestId: c.get('requestId') ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };
  return status ? c.json(response, status) : c.json(response);
}

/**
 * Build and return an error API response with standard meta envelope.
 *
 * @example
 * return apiError(c, { code: ERROR_CODES.NOT_FOUND, message: 'Record not found' }, 404);
 */
export function apiError(
  c: Context,
  error: { code: ErrorCode | string; message: string; details?: Record<string, unknown> },
  status: ContentfulStatusCode = 400
) {
  const response: ApiResponse = {
    success: false,
    error,
    meta: {
      requestId: c.get('requestId') ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };
  return c.json(response, status);
}

/**
 * Sanitize a user-provided ID string for safe interpolation in messages.
 * Strips all characters except word chars and hyphens, then truncates to 100 chars.
 */
export function sanitizeId(id: string): string {
  return id.replace(/[^\w-]/g, '').slice(0, 100);
}
