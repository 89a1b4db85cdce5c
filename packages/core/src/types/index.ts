/**
 * Core types
 * @packageDocumentation
 */

export {
  AppError,
  ValidationError,
  NotFoundError,
  DependencyConflictError,
  OperationInProgressError,
  ToolNotFoundError,
  CommandFailedError,
  QueryRejectedError,
  isAppError,
} from './errors.js';

export type {
  Row,
  ColumnInfo,
  ForeignKeyReference,
  TableSummary,
  TablePage,
  Condition,
} from './catalog.js';
