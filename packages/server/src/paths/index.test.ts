import { describe, it, expect, afterEach, vi } from 'vitest';
import { join, resolve } from 'node:path';
import { getBackupDir, getArchiveDir, resolvePgTool } from './index.js';

describe('maintenance paths', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('defaults to backups and archives under the working directory', () => {
    vi.stubEnv('BACKUP_DIR', '');
    vi.stubEnv('ARCHIVE_DIR', '');
    expect(getBackupDir()).toBe(resolve(process.cwd(), 'backups'));
    expect(getArchiveDir()).toBe(resolve(process.cwd(), 'archives'));
  });

  it('honors absolute overrides', () => {
    vi.stubEnv('BACKUP_DIR', '/srv/pg/backups');
    vi.stubEnv('ARCHIVE_DIR', '/srv/pg/archives');
    expect(getBackupDir()).toBe('/srv/pg/backups');
    expect(getArchiveDir()).toBe('/srv/pg/archives');
  });

  it('resolves tools on PATH unless PG_BIN_DIR is set', () => {
    vi.stubEnv('PG_BIN_DIR', '');
    expect(resolvePgTool('pg_dump')).toBe('pg_dump');
    vi.stubEnv('PG_BIN_DIR', '/usr/lib/postgresql/16/bin');
    expect(resolvePgTool('psql')).toBe(join('/usr/lib/postgresql/16/bin', 'psql'));
  });
});
