/**
 * Database Adapter Index Tests
 *
 * vi.resetModules() + dynamic re-import before every test so the
 * module-level adapter singleton starts empty.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';

const { mockPgAdapterInstance, MockPostgresAdapter } = vi.hoisted(() => {
  const mockPgAdapterInstance = {
    type: 'postgres' as const,
    initialize: vi.fn().mockResolvedValue(undefined),
    close: vi.fn().mockResolvedValue(undefined),
    isConnected: vi.fn().mockReturnValue(true),
  };

  // Regular function: arrow functions cannot be constructors
  const MockPostgresAdapter = vi.fn(function () {
    return mockPgAdapterInstance;
  });

  return { mockPgAdapterInstance, MockPostgresAdapter };
});

vi.mock('./postgres-adapter.js', () => ({ PostgresAdapter: MockPostgresAdapter }));

async function freshModule() {
  vi.resetModules();
  return import('./index.js');
}

describe('adapter lifecycle', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mockPgAdapterInstance.initialize.mockResolvedValue(undefined);
  });

  it('getAdapterSync throws before initialization', async () => {
    const mod = await freshModule();
    expect(() => mod.getAdapterSync()).toThrow('Database adapter not initialized');
  });

  it('initializeAdapter creates and initializes once', async () => {
    const mod = await freshModule();
    const first = await mod.initializeAdapter();
    const second = await mod.initializeAdapter();

    expect(first).toBe(second);
    expect(MockPostgresAdapter).toHaveBeenCalledTimes(1);
    expect(mockPgAdapterInstance.initialize).toHaveBeenCalledTimes(1);
    expect(mod.getAdapterSync()).toBe(first);
  });

  it('passes an explicit config to the adapter', async () => {
    const mod = await freshModule();
    const config = {
      type: 'postgres' as const,
      postgresUrl: 'postgresql://u:p@h:5432/d',
      postgresHost: 'h',
      postgresPort: 5432,
      postgresUser: 'u',
      postgresPassword: 'p',
      postgresDatabase: 'd',
      postgresPoolSize: 2,
    };
    await mod.createAdapter(config);
    expect(MockPostgresAdapter).toHaveBeenCalledWith(config);
  });

  it('propagates initialization failures and stays uninitialized', async () => {
    const mod = await freshModule();
    mockPgAdapterInstance.initialize.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    await expect(mod.initializeAdapter()).rejects.toThrow('ECONNREFUSED');
    expect(() => mod.getAdapterSync()).toThrow('Database adapter not initialized');
  });

  it('closeAdapter closes and forgets the adapter', async () => {
    const mod = await freshModule();
    await mod.initializeAdapter();
    await mod.closeAdapter();

    expect(mockPgAdapterInstance.close).toHaveBeenCalledOnce();
    expect(() => mod.getAdapterSync()).toThrow();
    await expect(mod.closeAdapter()).resolves.toBeUndefined();
  });
});
