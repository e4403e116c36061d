/**
 * Database Adapters
 *
 * PostgreSQL is the only supported database
 */

export * from './types.js';
export { PostgresAdapter, convertPlaceholders } from './postgres-adapter.js';

import type { DatabaseAdapter, DatabaseConfig } from './types.js';
import { getDatabaseConfig } from './types.js';
import { PostgresAdapter } from './postgres-adapter.js';
import { initializeSchema } from '../schema.js';
import { getLog } from '../../services/log.js';

const log = getLog('DbAdapter');

let adapter: DatabaseAdapter | null = null;

/**
 * Create and initialize a PostgreSQL database adapter
 */
export async function createAdapter(config?: DatabaseConfig): Promise<DatabaseAdapter> {
  const dbConfig = config ?? getDatabaseConfig();
  const pgAdapter = new PostgresAdapter(dbConfig);
  await pgAdapter.initialize();

  if (dbConfig.initializeSchema) {
    await initializeSchema((sql) => pgAdapter.exec(sql));
  }

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
    const current = adapter;
    adapter = null;
    await current.close();
  }
}
