/**
 * Gateway Default Configuration Tests
 */

import { describe, it, expect } from 'vitest';
import {
  DB_POOL_MAX,
  DB_IDLE_TIMEOUT_MS,
  DB_CONNECT_TIMEOUT_MS,
  HTTP_DEFAULT_PORT,
  HTTP_BODY_LIMIT_BYTES,
  INTEL_PLUGIN_TIMEOUT_MS,
  MAX_PAGE_SIZE,
  MAX_BATCH_IDS,
  SHUTDOWN_TIMEOUT_MS,
} from './defaults.js';
import { DEFAULT_PLUGIN_TIMEOUT_MS, DEFAULT_LIST_LIMIT, DEFAULT_BATCH_LIMIT } from '@content-intel/core';

describe('config/defaults', () => {
  it('keeps database timeouts ordered', () => {
    expect(DB_POOL_MAX).toBe(10);
    expect(DB_CONNECT_TIMEOUT_MS).toBeLessThan(DB_IDLE_TIMEOUT_MS);
  });

  it('listens on 8080 with a 1 MB body limit', () => {
    expect(HTTP_DEFAULT_PORT).toBe(8080);
    expect(HTTP_BODY_LIMIT_BYTES).toBe(1_048_576);
  });

  it('matches the collector default plugin budget', () => {
    expect(INTEL_PLUGIN_TIMEOUT_MS).toBe(DEFAULT_PLUGIN_TIMEOUT_MS);
  });

  it('allows the service default page sizes', () => {
    expect(MAX_PAGE_SIZE).toBeGreaterThanOrEqual(DEFAULT_LIST_LIMIT);
    expect(MAX_BATCH_IDS).toBeGreaterThanOrEqual(DEFAULT_BATCH_LIMIT);
  });

  it('gives shutdown a positive grace period', () => {
    expect(SHUTDOWN_TIMEOUT_MS).toBeGreaterThan(0);
  });
});
