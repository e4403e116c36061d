/**
 * Shared Test Helpers
 *
 * In-process stand-ins for gateway tests.
 *
 * Usage:
 *   const adapter = new FakeAdapter()
 *     .on(/FROM entities/, [{ entity_type: 'node', id: '1', ... }]);
 *   const repo = new EntitiesRepository(adapter);
 */

import type { Hono } from 'hono';
import { Services, createIntelPlugin, initServiceRegistry, type PluginRegistration } from '@content-intel/core';
import { createTestIntel, type TestIntel } from '@content-intel/core/test-helpers';
import type { DatabaseAdapter, QueryParams, Row } from './db/adapters/types.js';
import { createApp } from './app.js';

type Responder = Row[] | ((params: QueryParams, sql: string) => Row[]);

export interface RecordedCall {
  sql: string;
  params: QueryParams;
}

/**
 * DatabaseAdapter that answers queries from regex-matched canned rows.
 * The first matching handler wins; unmatched queries return no rows.
 */
export class FakeAdapter implements DatabaseAdapter {
  readonly type = 'postgres' as const;
  readonly calls: RecordedCall[] = [];
  private readonly handlers: Array<{ match: RegExp; respond: Responder }> = [];
  private connected = true;

  on(match: RegExp, respond: Responder): this {
    this.handlers.push({ match, respond });
    return this;
  }

  /** Calls whose SQL matches the pattern, in call order */
  callsMatching(match: RegExp): RecordedCall[] {
    return this.calls.filter((call) => match.test(call.sql));
  }

  isConnected(): boolean {
    return this.connected;
  }

  async query(sql: string, params: QueryParams = []): Promise<Row[]> {
    this.calls.push({ sql, params });
    const handler = this.handlers.find((candidate) => candidate.match.test(sql));
    if (!handler) return [];
    return typeof handler.respond === 'function' ? handler.respond(params, sql) : handler.respond;
  }

  async queryOne(sql: string, params: QueryParams = []): Promise<Row | null> {
    const rows = await this.query(sql, params);
    return rows[0] ?? null;
  }

  async execute(sql: string, params: QueryParams = []): Promise<{ changes: number }> {
    const rows = await this.query(sql, params);
    return { changes: rows.length > 0 ? rows.length : 1 };
  }

  async exec(sql: string): Promise<void> {
    this.calls.push({ sql, params: [] });
  }

  async close(): Promise<void> {
    this.connected = false;
  }
}

// ---------------------------------------------------------------------------
// Route test wiring
// ---------------------------------------------------------------------------

/**
 * Demo plugins for route tests: `title_stats` reports the label length,
 * `flaky` always throws, `offline` is never available.
 */
export function demoPlugins(): PluginRegistration[] {
  return [
    createIntelPlugin()
      .id('title_stats')
      .label('Title Stats')
      .weight(1)
      .collect((entity) => ({ length: entity.label.length }))
      .build(),
    createIntelPlugin()
      .id('flaky')
      .label('Flaky')
      .weight(2)
      .collect(() => {
        throw new Error('db timeout');
      })
      .build(),
    createIntelPlugin()
      .id('offline')
      .label('Offline')
      .weight(3)
      .available(() => false)
      .collect(() => ({ never: true }))
      .build(),
  ];
}

/**
 * Fresh global registry holding an in-memory intel service, plus the app.
 * Pair with `resetServiceRegistry()` in afterEach.
 */
export function createTestApp(options: Parameters<typeof createTestIntel>[0] = {}): TestIntel & { app: Hono } {
  const intel = createTestIntel(options);
  intel.registry.registerAll(demoPlugins());
  initServiceRegistry().register(Services.Intel, intel.service);
  return { ...intel, app: createApp() };
}
