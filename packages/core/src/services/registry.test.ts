/**
 * ServiceRegistry Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ServiceToken,
  ServiceRegistry,
  initServiceRegistry,
  getServiceRegistry,
  hasServiceRegistry,
  resetServiceRegistry,
} from './registry.js';
import { Services } from './tokens.js';
import { InMemoryConfigStore, createMockLog } from '../test-helpers.js';

describe('ServiceRegistry', () => {
  let registry: ServiceRegistry;

  beforeEach(() => {
    registry = new ServiceRegistry();
  });

  it('returns what was registered for a token', () => {
    const config = new InMemoryConfigStore();
    registry.register(Services.Config, config);

    expect(registry.get(Services.Config)).toBe(config);
    expect(registry.has(Services.Config)).toBe(true);
  });

  it('keeps tokens apart by name', () => {
    const log = createMockLog();
    registry.register(Services.Log, log);

    expect(registry.tryGet(Services.Intel)).toBeNull();
    expect(registry.has(Services.Intel)).toBe(false);
  });

  it('names the missing service', () => {
    expect(() => registry.get(Services.Intel)).toThrow(
      "Service 'intel' not registered. Register it during bootstrap before use."
    );
  });

  it('replaces an earlier registration', () => {
    const first = createMockLog();
    const second = createMockLog();
    registry.register(Services.Log, first);
    registry.register(Services.Log, second);

    expect(registry.get(Services.Log)).toBe(second);
    expect(registry.list()).toEqual(['log']);
  });

  it('lists names in registration order and clears', () => {
    registry.register(Services.Log, createMockLog());
    registry.register(Services.Config, new InMemoryConfigStore());
    expect(registry.list()).toEqual(['log', 'config']);

    registry.clear();
    expect(registry.list()).toEqual([]);
  });

  it('accepts falsy instances', () => {
    const flag = new ServiceToken<number>('retries');
    registry.register(flag, 0);
    expect(registry.get(flag)).toBe(0);
  });

  it('prints tokens by name', () => {
    expect(String(Services.SearchQueries)).toBe('ServiceToken(search-queries)');
  });
});

describe('global registry', () => {
  afterEach(() => {
    resetServiceRegistry();
  });

  it('is absent until initialized', () => {
    expect(hasServiceRegistry()).toBe(false);
    expect(() => getServiceRegistry()).toThrow(
      'ServiceRegistry not initialized. Call initServiceRegistry() during startup.'
    );
  });

  it('is shared once initialized', () => {
    const registry = initServiceRegistry();
    expect(getServiceRegistry()).toBe(registry);
    expect(hasServiceRegistry()).toBe(true);
  });

  it('refuses a second initialization', () => {
    initServiceRegistry();
    expect(() => initServiceRegistry()).toThrow('ServiceRegistry already initialized');
  });

  it('starts empty after a reset', () => {
    initServiceRegistry().register(Services.Log, createMockLog());
    resetServiceRegistry();

    expect(hasServiceRegistry()).toBe(false);
    expect(initServiceRegistry().list()).toEqual([]);
  });
});
