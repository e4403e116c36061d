/**
 * Intel runtime bootstrap tests
 */

import { describe, it, expect } from 'vitest';
import { ServiceRegistry, Services } from '@content-intel/core';
import { FakeAdapter } from '../test-helpers.js';
import { createIntelRuntime } from './intel-runtime.js';

function adapterWithTables(...tables: string[]): FakeAdapter {
  return new FakeAdapter()
    .on(/information_schema\.tables/, (params) => (tables.includes(String(params[0])) ? [{ found: 1 }] : []))
    .on(/FROM translation_settings/, [{ entity_type: 'node', bundle: 'article' }]);
}

function availability(runtime: Awaited<ReturnType<typeof createIntelRuntime>>): Record<string, boolean> {
  return Object.fromEntries(runtime.intel.getPlugins().map((plugin) => [plugin.id, plugin.available]));
}

describe('createIntelRuntime', () => {
  it('registers every service the routes and commands read', async () => {
    const services = new ServiceRegistry();
    const runtime = await createIntelRuntime({ adapter: adapterWithTables(), env: {}, services });

    expect(services.get(Services.Intel)).toBe(runtime.intel);
    expect(services.list().sort()).toEqual(['config', 'entities', 'intel', 'log', 'schema', 'search-queries']);
  });

  it('enables the optional plugins when their tables exist', async () => {
    const adapter = adapterWithTables('node_counter', 'translation_settings');
    const runtime = await createIntelRuntime({ adapter, env: {}, services: new ServiceRegistry() });

    expect(runtime.sources).toEqual({ statistics: true, translations: true });
    expect(availability(runtime)).toEqual({
      statistics: true,
      content_translation: true,
      word_count: true,
      entity_age: true,
    });
    expect(adapter.callsMatching(/FROM translation_settings/)).toHaveLength(1);
  });

  it('keeps the optional plugins registered but unavailable without their tables', async () => {
    const adapter = adapterWithTables();
    const runtime = await createIntelRuntime({ adapter, env: {}, services: new ServiceRegistry() });

    expect(runtime.sources).toEqual({ statistics: false, translations: false });
    expect(availability(runtime)).toMatchObject({ statistics: false, content_translation: false });
    expect(adapter.callsMatching(/FROM translation_settings/)).toHaveLength(0);
  });
});
