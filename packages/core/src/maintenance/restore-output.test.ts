import { describe, it, expect } from 'vitest';
import { classifyRestoreOutput, isRestoreFailure } from './restore-output.js';

describe('classifyRestoreOutput', () => {
  it('treats transaction_timeout noise as warnings', () => {
    const output = classifyRestoreOutput([
      'pg_restore: error: could not execute query: ERROR:  unrecognized configuration parameter "transaction_timeout"',
      'Command was: SET transaction_timeout = 0;',
      '',
    ].join('\n'));

    expect(output.errors).toEqual([]);
    expect(output.warnings).toHaveLength(2);
  });

  it('separates warnings, errors and progress lines', () => {
    const output = classifyRestoreOutput(
      'pg_restore: creating TABLE "public.books"\r\n' +
        'pg_restore: warning: errors ignored on restore: 1\n' +
        '  pg_restore: error: relation "books" already exists  \n'
    );

    expect(output.warnings).toEqual(['pg_restore: warning: errors ignored on restore: 1']);
    expect(output.errors).toEqual(['pg_restore: error: relation "books" already exists']);
  });
});

describe('isRestoreFailure', () => {
  it('requires both a non-zero exit and an error line', () => {
    expect(isRestoreFailure(1, { errors: ['error: x'], warnings: [] })).toBe(true);
    expect(isRestoreFailure(1, { errors: [], warnings: ['warning: y'] })).toBe(false);
    expect(isRestoreFailure(0, { errors: ['error: x'], warnings: [] })).toBe(false);
  });
});
