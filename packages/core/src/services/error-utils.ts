/**
 * Error Utility
 *
 * Extracts error messages from unknown catch values.
 */

/**
 * Extract error message from an unknown catch value.
 * Without a fallback, stringifies non-Error values via String().
 */
export function getErrorMessage(error: unknown, fallback?: string): string {
  return error instanceof Error ? error.message : (fallback ?? String(error));
}

/**
 * Read the `code` property Node attaches to system errors (ENOENT, EACCES, ...).
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
