/**
 * Base class and builder for intel plugins.
 *
 * Class-based plugins extend {@link BaseIntelPlugin} and implement `collect()`.
 * Small plugins can skip the class:
 *
 *   const registration = createIntelPlugin()
 *     .id('reading_time')
 *     .label('Reading Time')
 *     .weight(50)
 *     .collect((entity) => ({ minutes: estimate(entity) }))
 *     .build();
 *
 *   registry.register(registration.definition, registration.factory);
 */

import type { ContentEntity } from '../entities/types.js';
import type { IntelData } from '../types/json.js';
import type {
  IntelPlugin,
  PluginDefinition,
  PluginDescriptor,
  PluginRegistration,
} from './types.js';

export abstract class BaseIntelPlugin implements IntelPlugin {
  constructor(protected readonly descriptor: PluginDescriptor) {}

  get pluginId(): string {
    return this.descriptor.id;
  }

  isAvailable(): boolean {
    return true;
  }

  applies(entity: ContentEntity): boolean {
    const types = this.descriptor.entityTypes;
    return types.length === 0 || types.includes(entity.entityType);
  }

  abstract collect(entity: ContentEntity): IntelData | Promise<IntelData>;

  label(): string {
    return this.descriptor.label;
  }

  description(): string | null {
    return this.descriptor.description;
  }

  getWeight(): number {
    return this.descriptor.weight;
  }
}

type CollectFn = (entity: ContentEntity) => IntelData | Promise<IntelData>;
type PredicateFn = (entity: ContentEntity) => boolean;

class FunctionalIntelPlugin extends BaseIntelPlugin {
  constructor(
    descriptor: PluginDescriptor,
    private readonly collectFn: CollectFn,
    private readonly availableFn: (() => boolean) | undefined,
    private readonly appliesFn: PredicateFn | undefined
  ) {
    super(descriptor);
  }

  override isAvailable(): boolean {
    return this.availableFn ? this.availableFn() : super.isAvailable();
  }

  override applies(entity: ContentEntity): boolean {
    return this.appliesFn ? this.appliesFn(entity) : super.applies(entity);
  }

  collect(entity: ContentEntity): IntelData | Promise<IntelData> {
    return this.collectFn(entity);
  }
}

/**
 * Fluent builder producing a registry registration.
 */
export class IntelPluginBuilder {
  private definition: Partial<PluginDefinition> = {};
  private collectFn?: CollectFn;
  private availableFn?: () => boolean;
  private appliesFn?: PredicateFn;

  meta(definition: Partial<PluginDefinition>): this {
    this.definition = { ...this.definition, ...definition };
    return this;
  }

  id(id: string): this {
    this.definition.id = id;
    return this;
  }

  label(label: string): this {
    this.definition.label = label;
    return this;
  }

  description(description: string): this {
    this.definition.description = description;
    return this;
  }

  entityTypes(entityTypes: readonly string[]): this {
    this.definition.entityTypes = entityTypes;
    return this;
  }

  weight(weight: number): this {
    this.definition.weight = weight;
    return this;
  }

  provider(provider: string): this {
    this.definition.provider = provider;
    return this;
  }

  /**
   * Gate the plugin on an optional dependency.
   */
  available(predicate: () => boolean): this {
    this.availableFn = predicate;
    return this;
  }

  /**
   * Replace the entity-type applicability rule.
   */
  applies(predicate: PredicateFn): this {
    this.appliesFn = predicate;
    return this;
  }

  collect(fn: CollectFn): this {
    this.collectFn = fn;
    return this;
  }

  build(): PluginRegistration {
    const { id, label } = this.definition;
    if (!id || !label) {
      throw new Error('Intel plugin must have id and label');
    }
    const collectFn = this.collectFn;
    if (!collectFn) {
      throw new Error(`Intel plugin ${id} must define collect()`);
    }

    const availableFn = this.availableFn;
    const appliesFn = this.appliesFn;

    return {
      definition: { ...this.definition, id, label },
      factory: (descriptor) =>
        new FunctionalIntelPlugin(descriptor, collectFn, availableFn, appliesFn),
    };
  }
}

export function createIntelPlugin(): IntelPluginBuilder {
  return new IntelPluginBuilder();
}
