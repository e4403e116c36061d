/**
 * IntelPluginRegistry
 *
 * Explicit registration table for intel plugins. Plugins are registered
 * with a definition and a factory during startup; descriptor alters may
 * then rewrite the catalogue once per discovery cycle, after which the
 * descriptors are frozen until the next invalidate().
 */

import { ConflictError, UnknownPluginError, getErrorMessage } from '../types/errors.js';
import { getLog } from '../services/get-log.js';
import type { ContentEntity } from '../entities/types.js';
import type {
  DescriptorAlter,
  DescriptorDraft,
  IntelPlugin,
  PluginDefinition,
  PluginDescriptor,
  PluginFactory,
  PluginRegistration,
} from './types.js';

const log = getLog('IntelRegistry');

export const DEFAULT_PLUGIN_PROVIDER = 'unknown';

export interface RegisteredPlugin {
  id: string;
  plugin: IntelPlugin;
}

interface Registration {
  descriptor: PluginDescriptor;
  factory: PluginFactory;
}

export function toDescriptor(definition: PluginDefinition): PluginDescriptor {
  return freezeDescriptor({
    id: definition.id,
    label: definition.label,
    description: definition.description ?? null,
    entityTypes: [...(definition.entityTypes ?? [])],
    weight: definition.weight ?? 0,
    provider: definition.provider ?? DEFAULT_PLUGIN_PROVIDER,
    factory: definition.factory ?? definition.id,
  });
}

function freezeDescriptor(draft: DescriptorDraft): PluginDescriptor {
  return Object.freeze({ ...draft, entityTypes: Object.freeze([...draft.entityTypes]) });
}

export class IntelPluginRegistry {
  private readonly registrations = new Map<string, Registration>();
  private readonly alters: DescriptorAlter[] = [];
  private descriptorCache: ReadonlyMap<string, PluginDescriptor> | null = null;
  private readonly instances = new Map<string, IntelPlugin>();

  register(definition: PluginDefinition, factory: PluginFactory): void {
    if (this.registrations.has(definition.id)) {
      throw new ConflictError(`Intel plugin already registered: ${definition.id}`, {
        resource: definition.id,
      });
    }
    this.registrations.set(definition.id, { descriptor: toDescriptor(definition), factory });
    log.debug('Registered intel plugin', { id: definition.id });
    this.invalidate();
  }

  registerAll(registrations: Iterable<PluginRegistration>): void {
    for (const { definition, factory } of registrations) {
      this.register(definition, factory);
    }
  }

  /**
   * Append a transform applied to the descriptor set on each discovery cycle.
   * Alters run in the order they were added.
   */
  addDescriptorAlter(alter: DescriptorAlter): void {
    this.alters.push(alter);
    this.invalidate();
  }

  /**
   * Drop cached descriptors and instances; the next lookup rediscovers.
   */
  invalidate(): void {
    this.descriptorCache = null;
    this.instances.clear();
  }

  /**
   * Every known descriptor in discovery order, including unavailable plugins.
   */
  listDescriptors(): ReadonlyMap<string, PluginDescriptor> {
    if (this.descriptorCache) {
      return this.descriptorCache;
    }

    let drafts: DescriptorDraft[] = [...this.registrations.values()].map(({ descriptor }) => ({
      ...descriptor,
      entityTypes: [...descriptor.entityTypes],
    }));
    for (const alter of this.alters) {
      drafts = alter(drafts) ?? drafts;
    }

    const descriptors = new Map<string, PluginDescriptor>();
    for (const draft of drafts) {
      if (!this.registrations.has(draft.factory)) {
        log.warn('Dropping intel plugin with unknown factory', { id: draft.id, factory: draft.factory });
        continue;
      }
      if (descriptors.has(draft.id)) {
        log.warn('Dropping duplicate intel plugin descriptor', { id: draft.id });
        continue;
      }
      descriptors.set(draft.id, freezeDescriptor(draft));
    }

    this.descriptorCache = descriptors;
    return descriptors;
  }

  getDescriptor(id: string): PluginDescriptor | undefined {
    return this.listDescriptors().get(id);
  }

  has(id: string): boolean {
    return this.listDescriptors().has(id);
  }

  /**
   * Cached instance for a known plugin id.
   * @throws UnknownPluginError when the id is not in the current catalogue
   */
  instantiate(id: string): IntelPlugin {
    const cached = this.instances.get(id);
    if (cached) return cached;

    const descriptor = this.listDescriptors().get(id);
    const registration = descriptor ? this.registrations.get(descriptor.factory) : undefined;
    if (!descriptor || !registration) {
      throw new UnknownPluginError(id);
    }

    const instance = registration.factory(descriptor);
    this.instances.set(id, instance);
    return instance;
  }

  /**
   * Available plugins sorted by ascending weight. Equal weights keep discovery order.
   */
  availablePlugins(): RegisteredPlugin[] {
    const available: RegisteredPlugin[] = [];
    for (const id of this.listDescriptors().keys()) {
      const plugin = this.instantiate(id);
      if (this.check(id, 'isAvailable', () => plugin.isAvailable())) {
        available.push({ id, plugin });
      }
    }
    // Array.prototype.sort is stable
    return available.sort((a, b) => a.plugin.getWeight() - b.plugin.getWeight());
  }

  /**
   * Available plugins that apply to the entity, in weight order.
   */
  applicablePlugins(entity: ContentEntity): RegisteredPlugin[] {
    return this.availablePlugins().filter(({ id, plugin }) =>
      this.check(id, 'applies', () => plugin.applies(entity))
    );
  }

  private check(id: string, method: string, predicate: () => boolean): boolean {
    try {
      return predicate();
    } catch (error) {
      log.warn(`Intel plugin ${method}() threw, treating as false`, {
        id,
        error: getErrorMessage(error),
      });
      return false;
    }
  }
}
