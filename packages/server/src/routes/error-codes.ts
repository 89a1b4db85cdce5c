/**
 * Standardized Error Codes
 *
 * Centralized error code constants for consistent error handling across all routes.
 */

export const ERROR_CODES = {
  // Not Found Errors (404)
  NOT_FOUND: 'NOT_FOUND',

  // Validation Errors (400)
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  QUERY_FAILED: 'QUERY_FAILED',

  // Access & Permission Errors (403)
  FORBIDDEN: 'FORBIDDEN',

  // Conflict Errors (409)
  DEPENDENCY_CONFLICT: 'DEPENDENCY_CONFLICT',
  OPERATION_IN_PROGRESS: 'OPERATION_IN_PROGRESS',

  // Payload Too Large (413)
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',

  // Service Unavailable (503)
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',

  // Generic Operation Failures (500)
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
