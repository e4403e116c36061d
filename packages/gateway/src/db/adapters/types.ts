/**
 * Database Adapter Types
 *
 * Abstract interface over the PostgreSQL connection pool
 */

import { getLog } from '../../services/log.js';
import {
  DB_DEFAULT_HOST,
  DB_DEFAULT_NAME,
  DB_DEFAULT_PORT,
  DB_DEFAULT_USER,
  DB_POOL_MAX,
} from '../../config/defaults.js';
import { readIntEnv } from '../../config/env.js';

const log = getLog('DbAdapter');

export type DatabaseType = 'postgres';

/**
 * Query result row. Repositories validate rows with their own schemas.
 */
export type Row = Record<string, unknown>;

/**
 * Query parameters
 */
export type QueryParams = unknown[];

/**
 * Database adapter interface
 * All database operations go through this interface. SQL uses `?`
 * placeholders; the adapter rewrites them for the driver.
 */
export interface DatabaseAdapter {
  /** Database type identifier */
  readonly type: DatabaseType;

  /** Check if connection is active */
  isConnected(): boolean;

  /**
   * Execute a query that returns rows
   */
  query(sql: string, params?: QueryParams): Promise<Row[]>;

  /**
   * Execute a query that returns a single row
   */
  queryOne(sql: string, params?: QueryParams): Promise<Row | null>;

  /**
   * Execute a statement (INSERT, UPDATE, DELETE)
   * Returns the number of affected rows
   */
  execute(sql: string, params?: QueryParams): Promise<{ changes: number }>;

  /**
   * Execute raw SQL (for schema changes)
   */
  exec(sql: string): Promise<void>;

  /**
   * Close the database connection
   */
  close(): Promise<void>;
}

/**
 * Database configuration
 */
export interface DatabaseConfig {
  type: DatabaseType;
  postgresUrl: string;
  postgresHost: string;
  postgresPort: number;
  postgresUser: string;
  postgresDatabase: string;
  postgresPoolSize: number;
  /** Create missing tables on connect */
  initializeSchema: boolean;
}

/**
 * Get database configuration from environment.
 *
 * DATABASE_URL wins; otherwise the URL is assembled from POSTGRES_* variables.
 */
export function getDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const hasExplicitConfig = Boolean(env.DATABASE_URL || env.POSTGRES_HOST || env.POSTGRES_PASSWORD);
  if (env.NODE_ENV === 'production' && !hasExplicitConfig) {
    log.warn(
      'Running in production without explicit database credentials. ' +
        'Set DATABASE_URL or POSTGRES_* environment variables.'
    );
  }

  const host = env.POSTGRES_HOST || DB_DEFAULT_HOST;
  const port = readIntEnv(env, 'POSTGRES_PORT', DB_DEFAULT_PORT, { min: 1, max: 65_535 });
  const user = env.POSTGRES_USER || DB_DEFAULT_USER;
  const database = env.POSTGRES_DB || DB_DEFAULT_NAME;
  const password = env.POSTGRES_PASSWORD ?? '';
  const auth = password
    ? `${encodeURIComponent(user)}:${encodeURIComponent(password)}`
    : encodeURIComponent(user);

  return {
    type: 'postgres',
    postgresUrl: env.DATABASE_URL || `postgresql://${auth}@${host}:${port}/${database}`,
    postgresHost: host,
    postgresPort: port,
    postgresUser: user,
    postgresDatabase: database,
    postgresPoolSize: readIntEnv(env, 'POSTGRES_POOL_SIZE', DB_POOL_MAX, { min: 1 }),
    initializeSchema: env.DB_SKIP_SCHEMA !== 'true',
  };
}
