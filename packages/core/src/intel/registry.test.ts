import { describe, it, expect, vi, beforeEach } from 'vitest';
import { IntelPluginRegistry, toDescriptor } from './registry.js';
import { createIntelPlugin } from './plugin-base.js';
import { ConflictError, UnknownPluginError } from '../types/errors.js';
import { createTestEntity } from '../test-helpers.js';
import type { PluginDefinition } from './types.js';

function register(registry: IntelPluginRegistry, definition: PluginDefinition, available = true) {
  const { factory } = createIntelPlugin()
    .meta(definition)
    .available(() => available)
    .collect(() => ({ id: definition.id }))
    .build();
  registry.register(definition, factory);
}

describe('toDescriptor', () => {
  it('applies defaults', () => {
    expect(toDescriptor({ id: 'x', label: 'X' })).toEqual({
      id: 'x',
      label: 'X',
      description: null,
      entityTypes: [],
      weight: 0,
      provider: 'unknown',
      factory: 'x',
    });
  });

  it('freezes the descriptor', () => {
    const descriptor = toDescriptor({ id: 'x', label: 'X', entityTypes: ['node'] });
    expect(Object.isFrozen(descriptor)).toBe(true);
    expect(Object.isFrozen(descriptor.entityTypes)).toBe(true);
  });
});

describe('IntelPluginRegistry', () => {
  let registry: IntelPluginRegistry;

  beforeEach(() => {
    registry = new IntelPluginRegistry();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  describe('register', () => {
    it('lists descriptors in registration order', () => {
      register(registry, { id: 'b', label: 'B' });
      register(registry, { id: 'a', label: 'A' });
      expect([...registry.listDescriptors().keys()]).toEqual(['b', 'a']);
    });

    it('rejects duplicate ids', () => {
      register(registry, { id: 'a', label: 'A' });
      expect(() => register(registry, { id: 'a', label: 'Again' })).toThrow(ConflictError);
    });

    it('includes unavailable plugins in the catalogue', () => {
      register(registry, { id: 'statistics', label: 'Stats' }, false);
      expect(registry.has('statistics')).toBe(true);
      expect(registry.availablePlugins()).toEqual([]);
    });
  });

  describe('listDescriptors caching', () => {
    it('serves the same map until something changes', () => {
      register(registry, { id: 'a', label: 'A' });
      const first = registry.listDescriptors();
      expect(registry.listDescriptors()).toBe(first);

      register(registry, { id: 'b', label: 'B' });
      expect(registry.listDescriptors()).not.toBe(first);
    });

    it('runs alters once per discovery cycle', () => {
      register(registry, { id: 'a', label: 'A' });
      const alter = vi.fn();
      registry.addDescriptorAlter(alter);

      registry.listDescriptors();
      registry.listDescriptors();
      expect(alter).toHaveBeenCalledOnce();

      registry.invalidate();
      registry.listDescriptors();
      expect(alter).toHaveBeenCalledTimes(2);
    });
  });

  describe('descriptor alters', () => {
    beforeEach(() => {
      register(registry, { id: 'a', label: 'A', weight: 1 });
      register(registry, { id: 'b', label: 'B', weight: 2 });
    });

    it('can rename and re-weight in place', () => {
      registry.addDescriptorAlter((descriptors) => {
        for (const descriptor of descriptors) {
          if (descriptor.id === 'a') {
            descriptor.label = 'Renamed';
            descriptor.weight = 50;
          }
        }
      });

      expect(registry.getDescriptor('a')).toMatchObject({ label: 'Renamed', weight: 50 });
      expect(registry.availablePlugins().map(({ id }) => id)).toEqual(['b', 'a']);
      expect(registry.instantiate('a').label()).toBe('Renamed');
    });

    it('can restrict entity types', () => {
      registry.addDescriptorAlter((descriptors) => {
        for (const descriptor of descriptors) {
          if (descriptor.id === 'b') descriptor.entityTypes = ['user'];
        }
      });

      const node = createTestEntity();
      expect(registry.applicablePlugins(node).map(({ id }) => id)).toEqual(['a']);
    });

    it('can remove descriptors', () => {
      registry.addDescriptorAlter((descriptors) => descriptors.filter((d) => d.id !== 'a'));
      expect([...registry.listDescriptors().keys()]).toEqual(['b']);
      expect(() => registry.instantiate('a')).toThrow(UnknownPluginError);
    });

    it('can add descriptors backed by an existing factory', () => {
      registry.addDescriptorAlter((descriptors) => [
        ...descriptors,
        { ...toDescriptor({ id: 'a_copy', label: 'Copy', factory: 'a', weight: 0 }), entityTypes: [] },
      ]);

      const copy = registry.instantiate('a_copy');
      expect(copy.pluginId).toBe('a_copy');
      expect(registry.availablePlugins().map(({ id }) => id)).toEqual(['a_copy', 'a', 'b']);
    });

    it('drops descriptors whose factory is unknown', () => {
      registry.addDescriptorAlter((descriptors) => [
        ...descriptors,
        { ...toDescriptor({ id: 'ghost', label: 'Ghost', factory: 'nowhere' }), entityTypes: [] },
      ]);
      expect(registry.has('ghost')).toBe(false);
    });

    it('keeps the first of duplicate ids', () => {
      registry.addDescriptorAlter((descriptors) => [
        ...descriptors,
        { ...toDescriptor({ id: 'a', label: 'Second A', factory: 'b' }), entityTypes: [] },
      ]);
      expect(registry.getDescriptor('a')?.label).toBe('A');
    });

    it('applies alters in order', () => {
      registry.addDescriptorAlter((descriptors) => {
        descriptors.forEach((d) => { d.label = `${d.label}1`; });
      });
      registry.addDescriptorAlter((descriptors) => {
        descriptors.forEach((d) => { d.label = `${d.label}2`; });
      });
      expect(registry.getDescriptor('a')?.label).toBe('A12');
    });
  });

  describe('instantiate', () => {
    it('caches instances', () => {
      register(registry, { id: 'a', label: 'A' });
      expect(registry.instantiate('a')).toBe(registry.instantiate('a'));
    });

    it('rebuilds instances after invalidate', () => {
      register(registry, { id: 'a', label: 'A' });
      const first = registry.instantiate('a');
      registry.invalidate();
      expect(registry.instantiate('a')).not.toBe(first);
    });

    it('throws UnknownPluginError for unknown ids', () => {
      expect(() => registry.instantiate('missing')).toThrow('Unknown intel plugin: missing');
    });
  });

  describe('availablePlugins', () => {
    it('orders weights [30, 10, 20] ascending', () => {
      register(registry, { id: 'thirty', label: '30', weight: 30 });
      register(registry, { id: 'ten', label: '10', weight: 10 });
      register(registry, { id: 'twenty', label: '20', weight: 20 });
      expect(registry.availablePlugins().map(({ id }) => id)).toEqual(['ten', 'twenty', 'thirty']);
    });

    it('keeps discovery order for equal weights', () => {
      register(registry, { id: 'first', label: '1', weight: 5 });
      register(registry, { id: 'early', label: 'E', weight: 0 });
      register(registry, { id: 'second', label: '2', weight: 5 });
      register(registry, { id: 'third', label: '3', weight: 5 });
      expect(registry.availablePlugins().map(({ id }) => id)).toEqual(['early', 'first', 'second', 'third']);
    });

    it('skips plugins whose availability check throws', () => {
      const { factory } = createIntelPlugin()
        .id('flaky')
        .label('Flaky')
        .available(() => {
          throw new Error('no connection');
        })
        .collect(() => ({}))
        .build();
      registry.register({ id: 'flaky', label: 'Flaky' }, factory);
      register(registry, { id: 'ok', label: 'OK' });

      expect(registry.availablePlugins().map(({ id }) => id)).toEqual(['ok']);
    });
  });

  describe('applicablePlugins', () => {
    it('applies the entity type rule and keeps weight order', () => {
      register(registry, { id: 'users_only', label: 'U', entityTypes: ['user'], weight: 1 });
      register(registry, { id: 'all', label: 'All', weight: 20 });
      register(registry, { id: 'nodes', label: 'N', entityTypes: ['node'], weight: 10 });

      const node = createTestEntity();
      expect(registry.applicablePlugins(node).map(({ id }) => id)).toEqual(['nodes', 'all']);
    });

    it('never returns unavailable plugins', () => {
      register(registry, { id: 'statistics', label: 'Stats', entityTypes: ['node'] }, false);
      expect(registry.applicablePlugins(createTestEntity())).toEqual([]);
    });
  });
});
