/**
 * Base Repository Class for PostgreSQL
 *
 * Repositories take an adapter at construction, or fall back to the
 * global one. Rows are validated against zod schemas on the way out.
 */

import type { z } from 'zod';
import { getAdapterSync } from '../adapters/index.js';
import type { DatabaseAdapter, QueryParams } from '../adapters/types.js';

export abstract class BaseRepository {
  constructor(private adapter: DatabaseAdapter | null = null) {}

  /**
   * Get the database adapter (the global one must be initialized when none was injected)
   */
  protected getAdapter(): DatabaseAdapter {
    if (!this.adapter) {
      this.adapter = getAdapterSync();
    }
    return this.adapter;
  }

  /**
   * Execute a query and validate every row
   */
  protected async query<S extends z.ZodTypeAny>(schema: S, sql: string, params?: QueryParams): Promise<z.output<S>[]> {
    const rows = await this.getAdapter().query(sql, params);
    return rows.map((row) => schema.parse(row));
  }

  /**
   * Execute a query that returns a single row
   */
  protected async queryOne<S extends z.ZodTypeAny>(
    schema: S,
    sql: string,
    params?: QueryParams
  ): Promise<z.output<S> | null> {
    const row = await this.getAdapter().queryOne(sql, params);
    return row === null ? null : schema.parse(row);
  }

  /**
   * Execute a statement (INSERT, UPDATE, DELETE)
   */
  protected execute(sql: string, params?: QueryParams): Promise<{ changes: number }> {
    return this.getAdapter().execute(sql, params);
  }

  /**
   * Whether a table exists in the public schema
   */
  protected async tableExists(table: string): Promise<boolean> {
    const row = await this.getAdapter().queryOne(
      `SELECT 1 AS found FROM information_schema.tables
       WHERE table_schema = 'public' AND table_name = ?`,
      [table]
    );
    return row !== null;
  }

  /**
   * Whether a column exists on a table in the public schema
   */
  protected async columnExists(table: string, column: string): Promise<boolean> {
    const row = await this.getAdapter().queryOne(
      `SELECT 1 AS found FROM information_schema.columns
       WHERE table_schema = 'public' AND table_name = ? AND column_name = ?`,
      [table, column]
    );
    return row !== null;
  }
}
