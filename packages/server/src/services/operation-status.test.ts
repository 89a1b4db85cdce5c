import { describe, it, expect } from 'vitest';
import { OperationInProgressError } from '@pgdesk/core';
import { OperationLock } from './operation-status.js';

describe('OperationLock', () => {
  it('starts idle', () => {
    expect(new OperationLock().getStatus()).toEqual({ isRunning: false, output: [] });
  });

  it('records a successful run', async () => {
    const lock = new OperationLock();
    const result = await lock.runExclusive('backup', async () => {
      lock.appendOutput('pg_dump: dumping contents of table "public.books"');
      return 'done';
    });

    const status = lock.getStatus();
    expect(result).toBe('done');
    expect(status.isRunning).toBe(false);
    expect(status.operation).toBe('backup');
    expect(status.lastResult).toBe('success');
    expect(status.lastError).toBeUndefined();
    expect(status.output).toEqual(['pg_dump: dumping contents of table "public.books"']);
    expect(status.lastRun).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it('records a failure and rethrows', async () => {
    const lock = new OperationLock();
    await expect(
      lock.runExclusive('restore', async () => {
        throw new Error('pg_restore: error: connection refused');
      })
    ).rejects.toThrow('connection refused');

    const status = lock.getStatus();
    expect(status.isRunning).toBe(false);
    expect(status.lastResult).toBe('failure');
    expect(status.lastError).toBe('pg_restore: error: connection refused');
  });

  it('rejects a second operation while one is running', async () => {
    const lock = new OperationLock();
    let release: () => void = () => {};
    const running = lock.runExclusive('archive', () => new Promise<void>((resolve) => { release = resolve; }));

    expect(lock.getStatus().isRunning).toBe(true);
    await expect(lock.runExclusive('backup', async () => 'never')).rejects.toThrow(OperationInProgressError);
    await expect(lock.runExclusive('backup', async () => 'never')).rejects.toThrow(
      'A archive operation is already in progress'
    );

    release();
    await running;
    expect(lock.getStatus().isRunning).toBe(false);
    await expect(lock.runExclusive('backup', async () => 'ok')).resolves.toBe('ok');
  });

  it('keeps only the most recent output lines', async () => {
    const lock = new OperationLock(2);
    await lock.runExclusive('backup', async () => {
      lock.appendOutput('one');
      lock.appendOutput('two');
      lock.appendOutput('three');
    });
    expect(lock.getStatus().output).toEqual(['two', 'three']);
  });

  it('returns a copy of the status', () => {
    const lock = new OperationLock();
    lock.getStatus().output.push('tampered');
    expect(lock.getStatus().output).toEqual([]);
  });
});
