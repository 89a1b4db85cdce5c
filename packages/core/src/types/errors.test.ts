import { describe, it, expect } from 'vitest';
import {
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

// ---------------------------------------------------------------------------
// ValidationError
// ---------------------------------------------------------------------------
describe('ValidationError', () => {
  it('has correct code and statusCode', () => {
    const e = new ValidationError('No data to insert');
    expect(e.code).toBe('VALIDATION_ERROR');
    expect(e.statusCode).toBe(400);
    expect(e.name).toBe('ValidationError');
    expect(e.details()).toBeUndefined();
  });

  it('exposes the field when given', () => {
    const e = new ValidationError('Unknown column: nope', { field: 'nope' });
    expect(e.details()).toEqual({ field: 'nope' });
    expect(e.toJSON().field).toBe('nope');
  });
});

// ---------------------------------------------------------------------------
// NotFoundError
// ---------------------------------------------------------------------------
describe('NotFoundError', () => {
  it('formats resource and id into the message', () => {
    const e = new NotFoundError('Table', 'films');
    expect(e.message).toBe('Table not found: films');
    expect(e.statusCode).toBe(404);
    expect(e.details()).toEqual({ resource: 'Table', id: 'films' });
  });
});

// ---------------------------------------------------------------------------
// DependencyConflictError
// ---------------------------------------------------------------------------
describe('DependencyConflictError', () => {
  it('carries dependency counts', () => {
    const e = new DependencyConflictError({ 'loans.book_id': 3 });
    expect(e.code).toBe('DEPENDENCY_CONFLICT');
    expect(e.statusCode).toBe(409);
    expect(e.message).toBe('Cannot delete records because dependent data exists');
    expect(e.toJSON().dependencies).toEqual({ 'loans.book_id': 3 });
  });
});

// ---------------------------------------------------------------------------
// OperationInProgressError / ToolNotFoundError
// ---------------------------------------------------------------------------
describe('OperationInProgressError', () => {
  it('names the running operation', () => {
    const e = new OperationInProgressError('restore');
    expect(e.message).toBe('A restore operation is already in progress');
    expect(e.statusCode).toBe(409);
  });
});

describe('ToolNotFoundError', () => {
  it('is a 503 naming the tool', () => {
    const e = new ToolNotFoundError('pg_dump');
    expect(e.statusCode).toBe(503);
    expect(e.message.startsWith('pg_dump not found.')).toBe(true);
    expect(e.details()).toEqual({ tool: 'pg_dump' });
  });
});

// ---------------------------------------------------------------------------
// CommandFailedError
// ---------------------------------------------------------------------------
describe('CommandFailedError', () => {
  it('omits warnings when there are none', () => {
    const e = new CommandFailedError('boom', { command: 'pg_dump -d db' });
    expect(e.details()).toEqual({ command: 'pg_dump -d db' });
  });

  it('includes warnings when present', () => {
    const e = new CommandFailedError('boom', { command: 'pg_restore x', warnings: ['warning: w'] });
    expect(e.details()).toEqual({ command: 'pg_restore x', warnings: ['warning: w'] });
  });

  it('stores cause', () => {
    const cause = new Error('root');
    const e = new CommandFailedError('boom', { command: 'psql', cause });
    expect(e.cause).toBe(cause);
  });
});

// ---------------------------------------------------------------------------
// QueryRejectedError
// ---------------------------------------------------------------------------
describe('QueryRejectedError', () => {
  it('maps integrity violations to 409', () => {
    const e = new QueryRejectedError('duplicate key value violates unique constraint "books_pkey"', '23505');
    expect(e.statusCode).toBe(409);
    expect(e.details()).toEqual({ sqlState: '23505' });
  });

  it('maps other SQLSTATEs to 400', () => {
    expect(new QueryRejectedError('invalid input syntax for type integer: "x"', '22P02').statusCode).toBe(400);
  });
});

describe('isAppError', () => {
  it('recognizes subclasses only', () => {
    expect(isAppError(new NotFoundError('Backup', 'a.backup'))).toBe(true);
    expect(new ValidationError('x')).toBeInstanceOf(AppError);
    expect(isAppError(new Error('plain'))).toBe(false);
  });
});
