/**
 * Database Adapters
 *
 * PostgreSQL is the only supported database
 */

export * from './types.js';
export { PostgresAdapter } from './postgres-adapter.js';

import type { DatabaseAdapter, DatabaseConfig } from './types.js';
import { getDatabaseConfig } from './types.js';
import { PostgresAdapter } from './postgres-adapter.js';
import { getLog } from '../../services/log.js';

const log = getLog('DbAdapter');

let adapter: DatabaseAdapter | null = null;

/**
 * Create and initialize a PostgreSQL database adapter
 */
export async function createAdapter(config?: DatabaseConfig): Promise<DatabaseAdapter> {
  const pgAdapter = new PostgresAdapter(config ?? getDatabaseConfig());
  await pgAdapter.initialize();
  return pgAdapter;
}

/**
 * Get the global adapter synchronously (must be initialized first)
 */
export function getAdapterSync(): DatabaseAdapter {
  if (!adapter) {
    throw new Error('Database adapter not initialized. Call initializeAdapter() first.');
  }
  return adapter;
}

/**
 * Initialize the global adapter
 */
export async function initializeAdapter(config?: DatabaseConfig): Promise<DatabaseAdapter> {
  if (adapter) {
    log.info('Adapter already initialized');
    return adapter;
  }
  adapter = await createAdapter(config);
  return adapter;
}

/**
 * Close the global adapter
 */
export async function closeAdapter(): Promise<void> {
  if (adapter) {
    await adapter.close();
    adapter = null;
  }
}
