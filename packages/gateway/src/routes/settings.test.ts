/**
 * Settings Routes Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Hono } from 'hono';
import { ENABLED_PLUGINS_KEY, resetServiceRegistry } from '@content-intel/core';
import type { InMemoryConfigStore } from '@content-intel/core/test-helpers';
import { createTestApp } from '../test-helpers.js';

function putPlugins(app: Hono, body: unknown) {
  return app.request('/api/v1/settings/enabled-plugins', {
    method: 'PUT',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  });
}

describe('Settings Routes', () => {
  let app: Hono;
  let config: InMemoryConfigStore;

  beforeEach(() => {
    ({ app, config } = createTestApp());
  });

  afterEach(() => {
    resetServiceRegistry();
  });

  it('starts with an empty allow-list', async () => {
    const json = await (await app.request('/api/v1/settings/enabled-plugins')).json();
    expect(json.data).toEqual({ plugins: [] });
  });

  it('stores a de-duplicated allow-list', async () => {
    const res = await putPlugins(app, { plugins: ['title_stats', 'flaky', 'title_stats'] });
    const json = await res.json();

    expect(res.status).toBe(200);
    expect(json.data).toEqual({ plugins: ['title_stats', 'flaky'] });
    expect(config.values.get(ENABLED_PLUGINS_KEY)).toEqual(['title_stats', 'flaky']);
  });

  it('narrows collection to the allow-list', async () => {
    await putPlugins(app, { plugins: ['flaky'] });
    const res = await putPlugins(app, { plugins: ['title_stats'] });
    expect(res.status).toBe(200);

    const json = await (await app.request('/api/v1/settings/enabled-plugins')).json();
    expect(json.data).toEqual({ plugins: ['title_stats'] });
  });

  it('rejects unknown plugins with 404', async () => {
    const res = await putPlugins(app, { plugins: ['nope'] });
    const json = await res.json();

    expect(res.status).toBe(404);
    expect(json.error.code).toBe('UNKNOWN_PLUGIN');
    expect(config.values.has(ENABLED_PLUGINS_KEY)).toBe(false);
  });

  it('rejects unavailable plugins with 400', async () => {
    const res = await putPlugins(app, { plugins: ['offline'] });
    const json = await res.json();

    expect(res.status).toBe(400);
    expect(json.error.message).toBe('Intel plugin offline is not available and cannot be enabled');
  });

  it('clears the allow-list on an empty list or DELETE', async () => {
    config.values.set(ENABLED_PLUGINS_KEY, ['flaky']);
    await putPlugins(app, { plugins: [] });
    expect(config.values.has(ENABLED_PLUGINS_KEY)).toBe(false);

    config.values.set(ENABLED_PLUGINS_KEY, ['flaky']);
    const res = await app.request('/api/v1/settings/enabled-plugins', { method: 'DELETE' });
    expect((await res.json()).data).toEqual({ plugins: [] });
    expect(config.values.has(ENABLED_PLUGINS_KEY)).toBe(false);
  });

  it('validates the body', async () => {
    const res = await putPlugins(app, { plugins: 'flaky' });
    expect(res.status).toBe(400);
  });
});
