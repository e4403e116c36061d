/**
 * Shared test helpers for @content-intel/core
 *
 * Mock logger, entity factories and in-memory stand-ins for the storage
 * collaborators, so registry, collector and service tests (and the
 * gateway's route tests) run without a database.
 *
 * Because vi.mock() is hoisted to the top of each test file, the getLog
 * helpers are used INSIDE vi.mock factories:
 *
 *   vi.mock('../services/get-log.js', () => GET_LOG_MOCK);
 */

import { vi } from 'vitest';
import type { ILogService } from './services/log-service.js';
import type { IConfigStore } from './services/config-store.js';
import type {
  BundleInfo,
  ContentEntity,
  EntityField,
  EntitySummary,
  EntityTypeInfo,
  FieldDefinition,
  FieldInfo,
  FieldItem,
  IEntityStore,
  ISchemaIntrospection,
  ReferencedTarget,
  ResolvedListOptions,
} from './entities/types.js';
import { getEntitySummary } from './entities/summary.js';
import { IntelPluginRegistry } from './intel/registry.js';
import { IntelCollector, type IntelCollectorOptions } from './intel/collector.js';
import { ContentIntelService } from './intel/service.js';
import type { ISearchQueryCollector } from './intel/search-queries.js';
import type { IntelData, IntelValue } from './types/json.js';

// ---------------------------------------------------------------------------
// 1. Mock logger
// ---------------------------------------------------------------------------

/**
 * Create a mock ILogService. `child()` returns a fresh mock.
 */
export function createMockLog(): ILogService {
  const log: ILogService = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(() => createMockLog()),
  };
  return log;
}

export const GET_LOG_MOCK = {
  getLog: () => createMockLog(),
} as const;

// ---------------------------------------------------------------------------
// 2. Entity factories
// ---------------------------------------------------------------------------

export function item(properties: IntelData, target?: ReferencedTarget | null): FieldItem {
  return target === undefined ? { properties } : { properties, target };
}

export function field(
  definition: Partial<FieldDefinition> & Pick<FieldDefinition, 'name' | 'type'>,
  items: readonly FieldItem[]
): EntityField {
  return {
    definition: {
      label: definition.name,
      required: false,
      cardinality: 1,
      ...definition,
    },
    items,
  };
}

/** Single-value field holding `{ value }`. */
export function valueField(name: string, type: string, value: IntelValue, cardinality = 1): EntityField {
  return field({ name, type, cardinality }, [item({ value })]);
}

export function createTestEntity(overrides: Partial<ContentEntity> = {}): ContentEntity {
  return {
    entityType: 'node',
    id: '1',
    uuid: '00000000-0000-4000-8000-000000000001',
    label: 'Hello World',
    bundle: 'article',
    langcode: 'en',
    fields: [valueField('title', 'string', 'Hello World')],
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// 3. In-memory collaborators
// ---------------------------------------------------------------------------

function compareIdsDescending(a: string, b: string): number {
  const left = Number(a);
  const right = Number(b);
  if (Number.isFinite(left) && Number.isFinite(right)) return right - left;
  return a < b ? 1 : a > b ? -1 : 0;
}

function fieldMatches(entity: ContentEntity, name: string, expected: IntelValue): boolean {
  const found = entity.fields.find((candidate) => candidate.definition.name === name);
  return found?.items.some((item) => item.properties.value === expected || item.properties.target_id === expected) ?? false;
}

export class InMemoryEntityStore implements IEntityStore {
  private readonly entities: ContentEntity[];

  constructor(entities: readonly ContentEntity[] = []) {
    this.entities = [...entities];
  }

  add(entity: ContentEntity): void {
    this.entities.push(entity);
  }

  async load(entityType: string, id: string): Promise<ContentEntity | null> {
    return this.entities.find((entity) => entity.entityType === entityType && entity.id === id) ?? null;
  }

  async loadMany(entityType: string, ids: readonly string[]): Promise<ContentEntity[]> {
    const loaded: ContentEntity[] = [];
    for (const id of ids) {
      const entity = await this.load(entityType, id);
      if (entity) loaded.push(entity);
    }
    return loaded;
  }

  async list(entityType: string, options: ResolvedListOptions): Promise<EntitySummary[]> {
    return this.entities
      .filter((entity) => entity.entityType === entityType)
      .filter((entity) => options.bundle === null || entity.bundle === options.bundle)
      .filter((entity) =>
        Object.entries(options.conditions).every(([name, value]) => fieldMatches(entity, name, value))
      )
      .sort((a, b) => compareIdsDescending(a.id, b.id))
      .slice(options.offset, options.offset + options.limit)
      .map(getEntitySummary);
  }
}

export interface InMemorySchemaData {
  entityTypes?: EntityTypeInfo[];
  bundles?: Record<string, BundleInfo[]>;
  /** Keyed by `type` for base fields or `type.bundle` */
  fields?: Record<string, FieldInfo[]>;
}

export class InMemorySchema implements ISchemaIntrospection {
  constructor(private readonly data: InMemorySchemaData = {}) {}

  async entityTypes(): Promise<EntityTypeInfo[]> {
    return this.data.entityTypes ?? [];
  }

  async bundles(entityType: string): Promise<BundleInfo[]> {
    return this.data.bundles?.[entityType] ?? [];
  }

  async fields(entityType: string, bundle?: string | null): Promise<FieldInfo[]> {
    const key = bundle ? `${entityType}.${bundle}` : entityType;
    return this.data.fields?.[key] ?? [];
  }
}

export class InMemoryConfigStore implements IConfigStore {
  readonly values = new Map<string, IntelValue>();

  async get(key: string): Promise<IntelValue | undefined> {
    return this.values.get(key);
  }

  async set(key: string, value: IntelValue): Promise<void> {
    this.values.set(key, value);
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
  }
}

// ---------------------------------------------------------------------------
// 4. Wiring
// ---------------------------------------------------------------------------

export interface TestIntel {
  registry: IntelPluginRegistry;
  collector: IntelCollector;
  service: ContentIntelService;
  entities: InMemoryEntityStore;
  schema: InMemorySchema;
  config: InMemoryConfigStore;
}

/**
 * Registry, collector and service over in-memory collaborators.
 */
export function createTestIntel(
  options: {
    entities?: readonly ContentEntity[];
    schema?: InMemorySchemaData;
    searchQueries?: ISearchQueryCollector | null;
  } & Partial<Omit<IntelCollectorOptions, 'registry' | 'config'>> = {}
): TestIntel {
  const registry = new IntelPluginRegistry();
  const config = new InMemoryConfigStore();
  const entities = new InMemoryEntityStore(options.entities);
  const schema = new InMemorySchema(options.schema);
  const collector = new IntelCollector({
    registry,
    config,
    timeoutMs: options.timeoutMs,
    mode: options.mode,
  });
  const service = new ContentIntelService({
    registry,
    collector,
    entities,
    schema,
    config,
    searchQueries: options.searchQueries,
  });
  return { registry, collector, service, entities, schema, config };
}
