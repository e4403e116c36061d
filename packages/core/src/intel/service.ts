/**
 * ContentIntelService
 *
 * Single entry point for routes and CLI commands: schema passthroughs,
 * plugin catalogue and allow-list, entity loading, and intel collection.
 */

import { EntityNotFoundError, UnknownPluginError, ValidationError, getErrorMessage } from '../types/errors.js';
import { getLog } from '../services/get-log.js';
import { ENABLED_PLUGINS_KEY, readStringList, type IConfigStore } from '../services/config-store.js';
import { getEntitySummary } from '../entities/summary.js';
import type {
  BundleInfo,
  ContentEntity,
  EntitySummary,
  EntityTypeInfo,
  FieldInfo,
  IEntityStore,
  ISchemaIntrospection,
  ListEntitiesOptions,
} from '../entities/types.js';
import type { IntelCollector } from './collector.js';
import type { IntelPluginRegistry } from './registry.js';
import type { ISearchQueryCollector } from './search-queries.js';
import type { IntelReport, PluginInfo } from './types.js';

const log = getLog('ContentIntelService');

export const DEFAULT_LIST_LIMIT = 50;
export const DEFAULT_BATCH_LIMIT = 10;

export interface ContentIntelServiceDeps {
  registry: IntelPluginRegistry;
  collector: IntelCollector;
  entities: IEntityStore;
  schema: ISchemaIntrospection;
  config: IConfigStore;
  searchQueries?: ISearchQueryCollector | null;
}

export interface BatchOptions {
  /** Explicit ids; when set, bundle and limit are ignored */
  ids?: readonly string[];
  bundle?: string | null;
  limit?: number;
  fields?: readonly string[];
  plugins?: readonly string[];
}

function byKey<T>(key: (item: T) => string): (a: T, b: T) => number {
  return (a, b) => {
    const left = key(a);
    const right = key(b);
    return left < right ? -1 : left > right ? 1 : 0;
  };
}

function assertPaging(limit: number, offset: number): void {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError(`limit must be a positive integer, got ${limit}`, { field: 'limit' });
  }
  if (!Number.isInteger(offset) || offset < 0) {
    throw new ValidationError(`offset must be a non-negative integer, got ${offset}`, { field: 'offset' });
  }
}

export class ContentIntelService {
  readonly searchQueries: ISearchQueryCollector | null;

  constructor(private readonly deps: ContentIntelServiceDeps) {
    this.searchQueries = deps.searchQueries ?? null;
  }

  // ==========================================================================
  // Schema
  // ==========================================================================

  async getEntityTypes(): Promise<EntityTypeInfo[]> {
    const types = await this.deps.schema.entityTypes();
    return [...types].sort(byKey((type) => type.id));
  }

  async getBundles(entityType: string): Promise<BundleInfo[]> {
    const bundles = await this.deps.schema.bundles(entityType);
    return [...bundles].sort(byKey((bundle) => bundle.id));
  }

  async getFields(entityType: string, bundle?: string | null): Promise<FieldInfo[]> {
    const fields = await this.deps.schema.fields(entityType, bundle ?? null);
    return [...fields].sort(byKey((field) => field.name));
  }

  // ==========================================================================
  // Plugins
  // ==========================================================================

  /**
   * Every descriptor in discovery order, whatever the allow-list says.
   */
  getPlugins(): PluginInfo[] {
    const { registry } = this.deps;
    return [...registry.listDescriptors().values()].map((descriptor) => {
      const plugin = registry.instantiate(descriptor.id);
      let available = false;
      try {
        available = plugin.isAvailable();
      } catch (error) {
        log.warn('Availability check failed', { id: descriptor.id, error: getErrorMessage(error) });
      }
      return {
        id: descriptor.id,
        label: plugin.label(),
        description: plugin.description(),
        provider: descriptor.provider,
        available,
        entityTypes: [...descriptor.entityTypes],
        weight: plugin.getWeight(),
      };
    });
  }

  getEnabledPlugins(): Promise<string[]> {
    return readStringList(this.deps.config, ENABLED_PLUGINS_KEY);
  }

  /**
   * Replace the allow-list. An empty list clears it so every plugin runs.
   * @throws UnknownPluginError for ids outside the catalogue
   * @throws ValidationError for plugins that are currently unavailable
   */
  async setEnabledPlugins(ids: readonly string[]): Promise<string[]> {
    const unique = [...new Set(ids)];
    const catalogue = this.getPlugins();

    for (const id of unique) {
      const info = catalogue.find((plugin) => plugin.id === id);
      if (!info) {
        throw new UnknownPluginError(id);
      }
      if (!info.available) {
        throw new ValidationError(`Intel plugin ${id} is not available and cannot be enabled`, {
          field: 'plugins',
        });
      }
    }

    if (unique.length === 0) {
      await this.deps.config.delete(ENABLED_PLUGINS_KEY);
    } else {
      await this.deps.config.set(ENABLED_PLUGINS_KEY, unique);
    }
    log.info('Enabled plugins updated', { plugins: unique });
    return unique;
  }

  // ==========================================================================
  // Entities
  // ==========================================================================

  loadEntity(entityType: string, id: string): Promise<ContentEntity | null> {
    return this.deps.entities.load(entityType, id);
  }

  /**
   * @throws EntityNotFoundError when the entity does not exist
   */
  async requireEntity(entityType: string, id: string): Promise<ContentEntity> {
    const entity = await this.loadEntity(entityType, id);
    if (!entity) {
      throw new EntityNotFoundError(entityType, id);
    }
    return entity;
  }

  loadEntities(entityType: string, ids: readonly string[]): Promise<ContentEntity[]> {
    if (ids.length === 0) return Promise.resolve([]);
    return this.deps.entities.loadMany(entityType, ids);
  }

  /**
   * Entity summaries, newest first.
   */
  listEntities(entityType: string, options: ListEntitiesOptions = {}): Promise<EntitySummary[]> {
    const limit = options.limit ?? DEFAULT_LIST_LIMIT;
    const offset = options.offset ?? 0;
    assertPaging(limit, offset);

    return this.deps.entities.list(entityType, {
      bundle: options.bundle || null,
      limit,
      offset,
      conditions: options.conditions ?? {},
    });
  }

  getEntitySummary(entity: ContentEntity): EntitySummary {
    return getEntitySummary(entity);
  }

  // ==========================================================================
  // Intel
  // ==========================================================================

  collectIntel(
    entity: ContentEntity,
    fields: readonly string[] = [],
    plugins: readonly string[] = []
  ): Promise<IntelReport> {
    return this.deps.collector.collect(entity, fields, plugins);
  }

  /**
   * Load then collect.
   * @throws EntityNotFoundError when the entity does not exist
   */
  async collectIntelFor(
    entityType: string,
    id: string,
    fields: readonly string[] = [],
    plugins: readonly string[] = []
  ): Promise<IntelReport> {
    const entity = await this.requireEntity(entityType, id);
    return this.collectIntel(entity, fields, plugins);
  }

  /**
   * Reports for explicit ids, or for the newest `limit` entities of a bundle.
   * Ids that do not resolve are skipped. Reports follow the loaded order.
   */
  async collectBatch(entityType: string, options: BatchOptions = {}): Promise<IntelReport[]> {
    let ids = options.ids ? [...options.ids] : [];
    if (ids.length === 0) {
      const summaries = await this.listEntities(entityType, {
        bundle: options.bundle ?? null,
        limit: options.limit ?? DEFAULT_BATCH_LIMIT,
      });
      ids = summaries.map((summary) => summary.id);
    }

    const entities = await this.loadEntities(entityType, ids);
    return Promise.all(
      entities.map((entity) => this.collectIntel(entity, options.fields ?? [], options.plugins ?? []))
    );
  }
}
