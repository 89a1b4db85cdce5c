/**
 * Structured error classes for the console services
 * All errors are serializable and carry the HTTP status they map to
 */

/**
 * Base application error with structured metadata
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: 400 | 404 | 409 | 500 | 503;
  readonly timestamp: Date = new Date();
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = this.constructor.name;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Extra fields exposed to API clients next to code and message.
   */
  details(): Record<string, unknown> | undefined {
    return undefined;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
      ...this.details(),
    };
  }
}

/**
 * Validation error - invalid input data
 */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly statusCode = 400;
  readonly field?: string;

  constructor(message: string, options?: { field?: string; cause?: unknown }) {
    super(message, options);
    this.field = options?.field;
  }

  override details(): Record<string, unknown> | undefined {
    return this.field ? { field: this.field } : undefined;
  }
}

/**
 * Not found error - table, record, backup or archive doesn't exist
 */
export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND' as const;
  readonly statusCode = 404;
  readonly resource: string;
  readonly id: string;

  constructor(resource: string, id: string, options?: { cause?: unknown }) {
    super(`${resource} not found: ${id}`, options);
    this.resource = resource;
    this.id = id;
  }

  override details(): Record<string, unknown> {
    return { resource: this.resource, id: this.id };
  }
}

/**
 * Delete blocked by rows in other tables that reference the targeted rows.
 * Keys are `table.column` of the referencing foreign key.
 */
export class DependencyConflictError extends AppError {
  readonly code = 'DEPENDENCY_CONFLICT' as const;
  readonly statusCode = 409;
  readonly dependencies: Readonly<Record<string, number>>;

  constructor(dependencies: Record<string, number>) {
    super('Cannot delete records because dependent data exists');
    this.dependencies = dependencies;
  }

  override details(): Record<string, unknown> {
    return { dependencies: this.dependencies };
  }
}

/**
 * Another maintenance operation holds the lock
 */
export class OperationInProgressError extends AppError {
  readonly code = 'OPERATION_IN_PROGRESS' as const;
  readonly statusCode = 409;
  readonly operation: string;

  constructor(operation: string) {
    super(`A ${operation} operation is already in progress`);
    this.operation = operation;
  }

  override details(): Record<string, unknown> {
    return { operation: this.operation };
  }
}

/**
 * A PostgreSQL client binary could not be started
 */
export class ToolNotFoundError extends AppError {
  readonly code = 'TOOL_NOT_FOUND' as const;
  readonly statusCode = 503;
  readonly tool: string;

  constructor(tool: string, options?: { cause?: unknown }) {
    super(
      `${tool} not found. Install the PostgreSQL client tools (psql, pg_dump, pg_restore) ` +
        'or set PG_BIN_DIR to their directory.',
      options
    );
    this.tool = tool;
  }

  override details(): Record<string, unknown> {
    return { tool: this.tool };
  }
}

/**
 * An external command exited unsuccessfully
 */
export class CommandFailedError extends AppError {
  readonly code = 'COMMAND_FAILED' as const;
  readonly statusCode = 500;
  readonly command: string;
  readonly warnings: readonly string[];

  constructor(message: string, options: { command: string; warnings?: readonly string[]; cause?: unknown }) {
    super(message, options);
    this.command = options.command;
    this.warnings = options.warnings ?? [];
  }

  override details(): Record<string, unknown> {
    return this.warnings.length > 0
      ? { command: this.command, warnings: this.warnings }
      : { command: this.command };
  }
}

/**
 * PostgreSQL rejected a generated statement. Integrity violations
 * (SQLSTATE class 23) map to 409, everything else to 400.
 */
export class QueryRejectedError extends AppError {
  readonly code = 'QUERY_REJECTED' as const;
  readonly statusCode: 400 | 409;
  readonly sqlState: string;

  constructor(message: string, sqlState: string, options?: { cause?: unknown }) {
    super(message, options);
    this.sqlState = sqlState;
    this.statusCode = sqlState.startsWith('23') ? 409 : 400;
  }

  override details(): Record<string, unknown> {
    return { sqlState: this.sqlState };
  }
}

/**
 * Check if a value is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
