/**
 * PostgreSQL Database Adapter
 *
 * Uses the 'pg' package with connection pooling
 */

import pg from 'pg';
import type { DatabaseAdapter, DatabaseConfig, Row, QueryParams } from './types.js';
import { getLog } from '../../services/log.js';
import { DB_IDLE_TIMEOUT_MS, DB_CONNECT_TIMEOUT_MS } from '../../config/defaults.js';

const log = getLog('PostgresAdapter');

const { Pool } = pg;
type PoolType = InstanceType<typeof Pool>;

/**
 * Rewrite `?` placeholders to `$1, $2, ...`. Question marks inside
 * single-quoted literals are left alone.
 */
export function convertPlaceholders(sql: string): string {
  let index = 0;
  let inLiteral = false;
  let out = '';
  for (const char of sql) {
    if (char === "'") {
      inLiteral = !inLiteral;
      out += char;
    } else if (char === '?' && !inLiteral) {
      index++;
      out += `$${index}`;
    } else {
      out += char;
    }
  }
  return out;
}

export class PostgresAdapter implements DatabaseAdapter {
  readonly type = 'postgres' as const;
  private pool: PoolType | null = null;

  constructor(private readonly config: DatabaseConfig) {}

  /**
   * Open the pool and check the connection
   */
  async initialize(): Promise<void> {
    this.pool = new Pool({
      connectionString: this.config.postgresUrl,
      max: this.config.postgresPoolSize,
      idleTimeoutMillis: DB_IDLE_TIMEOUT_MS,
      connectionTimeoutMillis: DB_CONNECT_TIMEOUT_MS,
    });

    const client = await this.pool.connect();
    try {
      await client.query('SELECT 1');
      log.info(`Connected to ${this.config.postgresHost}/${this.config.postgresDatabase}`);
    } finally {
      client.release();
    }
  }

  isConnected(): boolean {
    return this.pool !== null;
  }

  async query(sql: string, params: QueryParams = []): Promise<Row[]> {
    const result = await this.requirePool().query<Row>(convertPlaceholders(sql), params);
    return result.rows;
  }

  async queryOne(sql: string, params: QueryParams = []): Promise<Row | null> {
    const rows = await this.query(sql, params);
    return rows[0] ?? null;
  }

  async execute(sql: string, params: QueryParams = []): Promise<{ changes: number }> {
    const result = await this.requirePool().query(convertPlaceholders(sql), params);
    return { changes: result.rowCount ?? 0 };
  }

  async exec(sql: string): Promise<void> {
    await this.requirePool().query(sql);
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
      log.info('Connection pool closed');
    }
  }

  private requirePool(): PoolType {
    if (!this.pool) throw new Error('Database not initialized');
    return this.pool;
  }
}
