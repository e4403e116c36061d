/**
 * Schema and plugin command tests
 */

import { describe, it, expect, vi, beforeEach, type MockInstance } from 'vitest';
import { createIntelPlugin } from '@content-intel/core';
import { createTestIntel, type TestIntel } from '@content-intel/core/test-helpers';

const mockStartIntelRuntime = vi.hoisted(() => vi.fn());
const mockStopIntelRuntime = vi.hoisted(() => vi.fn());

vi.mock('@content-intel/gateway', () => ({
  startIntelRuntime: mockStartIntelRuntime,
  stopIntelRuntime: mockStopIntelRuntime,
}));

import { listBundles, listFields, listTypes } from './schema.js';
import { listPlugins } from './plugins.js';

describe('Schema CLI Commands', () => {
  let intel: TestIntel;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let exitSpy: MockInstance<typeof process.exit>;

  const printed = () => String(logSpy.mock.calls.at(-1)?.[0]);

  beforeEach(() => {
    vi.clearAllMocks();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);

    intel = createTestIntel({
      schema: {
        entityTypes: [
          { id: 'user', label: 'User', bundleEntityType: null },
          { id: 'node', label: 'Content', bundleEntityType: 'node_type' },
        ],
        bundles: { node: [{ id: 'page', label: 'Basic page' }, { id: 'article', label: 'Article' }] },
        fields: {
          node: [{ name: 'nid', label: 'ID', type: 'integer', required: false, cardinality: 1 }],
          'node.article': [{ name: 'title', label: 'Title', type: 'string', required: true, cardinality: 1 }],
        },
      },
    });
    intel.registry.registerAll([
      createIntelPlugin()
        .id('title_stats')
        .label('Title Stats')
        .provider('demo')
        .collect((entity) => ({ length: entity.label.length }))
        .build(),
      createIntelPlugin()
        .id('offline')
        .label('Offline')
        .available(() => false)
        .collect(() => ({}))
        .build(),
    ]);

    mockStartIntelRuntime.mockResolvedValue({ intel: intel.service });
    mockStopIntelRuntime.mockResolvedValue(undefined);
  });

  describe('listTypes', () => {
    it('prints a table of id and label sorted by id', async () => {
      await listTypes();

      expect(printed()).toBe(['ID    Label', '────  ───────', 'node  Content', 'user  User'].join('\n'));
      expect(mockStopIntelRuntime).toHaveBeenCalledTimes(1);
      expect(exitSpy).not.toHaveBeenCalled();
    });

    it('prints JSON on request', async () => {
      await listTypes({ format: 'json' });

      expect(JSON.parse(printed())).toEqual([
        { id: 'node', label: 'Content', bundleEntityType: 'node_type' },
        { id: 'user', label: 'User', bundleEntityType: null },
      ]);
    });
  });

  describe('listBundles', () => {
    it('prints bundles of one type', async () => {
      await listBundles('node');

      expect(printed()).toBe(
        ['ID       Label', '───────  ──────────', 'article  Article', 'page     Basic page'].join('\n')
      );
    });
  });

  describe('listFields', () => {
    it('prints base fields without a bundle', async () => {
      await listFields('node', undefined, { format: 'json' });

      expect(JSON.parse(printed()).map((f: { name: string }) => f.name)).toEqual(['nid']);
    });

    it('prints name, label and type for a bundle', async () => {
      await listFields('node', 'article');

      expect(printed()).toBe(['Name   Label  Type', '─────  ─────  ──────', 'title  Title  string'].join('\n'));
    });
  });

  describe('listPlugins', () => {
    it('lists available and unavailable plugins', async () => {
      await listPlugins({ format: 'json' });

      const plugins: Array<{ id: string; provider: string; available: boolean }> = JSON.parse(printed());
      expect(plugins.map((p) => [p.id, p.provider, p.available])).toEqual([
        ['title_stats', 'demo', true],
        ['offline', 'unknown', false],
      ]);
    });
  });

  describe('failures', () => {
    it('prints the error and exits 1 when the runtime cannot start', async () => {
      mockStartIntelRuntime.mockRejectedValue(new Error('connect ECONNREFUSED'));

      await listTypes();

      expect(errorSpy).toHaveBeenCalledWith('Error: connect ECONNREFUSED');
      expect(exitSpy).toHaveBeenCalledWith(1);
      expect(mockStopIntelRuntime).toHaveBeenCalledTimes(1);
    });

    it('rejects an unknown format', async () => {
      await listTypes({ format: 'xml' });

      expect(errorSpy).toHaveBeenCalledWith('Error: Unknown format "xml". Use one of: json, yaml, table');
      expect(exitSpy).toHaveBeenCalledWith(1);
    });
  });
});
