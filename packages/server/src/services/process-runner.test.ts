import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'node:events';
import { ToolNotFoundError } from '@pgdesk/core';

class FakeChild extends EventEmitter {
  readonly stdout = new EventEmitter();
  readonly stderr = new EventEmitter();
}

const { mockSpawn } = vi.hoisted(() => ({ mockSpawn: vi.fn() }));

vi.mock('child_process', () => ({ spawn: mockSpawn }));

const { runProcess } = await import('./process-runner.js');

function nextChild(): FakeChild {
  const child = new FakeChild();
  mockSpawn.mockReturnValueOnce(child);
  return child;
}

describe('runProcess', () => {
  beforeEach(() => {
    mockSpawn.mockReset();
  });

  it('collects output and resolves with the exit code', async () => {
    const child = nextChild();
    const lines: string[] = [];
    const pending = runProcess('pg_dump', ['-F', 'c'], {
      env: { PGPASSWORD: 'test-secret' },
      onLine: (line, stream) => lines.push(`${stream}:${line}`),
    });

    child.stdout.emit('data', Buffer.from('first\n\n'));
    child.stderr.emit('data', Buffer.from('  pg_dump: warning: careful  \nsecond\n'));
    child.emit('close', 0);

    await expect(pending).resolves.toEqual({
      exitCode: 0,
      stdout: 'first\n\n',
      stderr: '  pg_dump: warning: careful  \nsecond\n',
    });
    expect(lines).toEqual(['stdout:first', 'stderr:pg_dump: warning: careful', 'stderr:second']);
    expect(mockSpawn).toHaveBeenCalledWith('pg_dump', ['-F', 'c'], { env: { PGPASSWORD: 'test-secret' } });
  });

  it('joins characters and lines split across chunks', async () => {
    const child = nextChild();
    const lines: string[] = [];
    const pending = runProcess('pg_restore', [], { onLine: (line) => lines.push(line) });

    const message = Buffer.from('pg_restore: ошибка\nпоследняя строка', 'utf8');
    // 'ш' is two bytes; split between them
    const cut = Buffer.from('pg_restore: о', 'utf8').length + 1;
    child.stderr.emit('data', message.subarray(0, cut));
    child.stderr.emit('data', message.subarray(cut));
    child.emit('close', 1);

    await expect(pending).resolves.toEqual({
      exitCode: 1,
      stdout: '',
      stderr: 'pg_restore: ошибка\nпоследняя строка',
    });
    expect(lines).toEqual(['pg_restore: ошибка', 'последняя строка']);
  });

  it('emits a line only once its newline arrives', async () => {
    const child = nextChild();
    const lines: string[] = [];
    const pending = runProcess('pg_dump', [], { onLine: (line) => lines.push(line) });

    child.stdout.emit('data', Buffer.from('pg_dump: dumping con'));
    expect(lines).toEqual([]);
    child.stdout.emit('data', Buffer.from('tents of table "public.books"\r\nnext'));
    expect(lines).toEqual(['pg_dump: dumping contents of table "public.books"']);
    child.emit('close', 0);

    await pending;
    expect(lines).toEqual(['pg_dump: dumping contents of table "public.books"', 'next']);
  });

  it('treats a signal exit as failure', async () => {
    const child = nextChild();
    const pending = runProcess('psql', []);
    child.emit('close', null);
    await expect(pending).resolves.toMatchObject({ exitCode: 1 });
  });

  it('maps a missing executable to ToolNotFoundError', async () => {
    const child = nextChild();
    const pending = runProcess('/opt/pg/bin/pg_restore', []);
    child.emit('error', Object.assign(new Error('spawn pg_restore ENOENT'), { code: 'ENOENT' }));

    await expect(pending).rejects.toBeInstanceOf(ToolNotFoundError);
    await expect(pending).rejects.toMatchObject({ tool: 'pg_restore' });
  });

  it('passes other spawn errors through', async () => {
    const child = nextChild();
    const pending = runProcess('pg_dump', []);
    child.emit('error', Object.assign(new Error('spawn EACCES'), { code: 'EACCES' }));
    await expect(pending).rejects.toThrow('spawn EACCES');
  });
});
