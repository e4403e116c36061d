import type { ContentEntity } from '../entities/types.js';
import type { Clock } from '../services/clock.js';
import { BaseIntelPlugin } from '../intel/plugin-base.js';
import { describeDuration, describeTimestamp } from '../intel/format.js';
import type { PluginDefinition, PluginDescriptor } from '../intel/types.js';
import type { IntelData } from '../types/json.js';

export type Freshness = 'new' | 'recent' | 'current' | 'aging' | 'old' | 'archival';

export const entityAgeDefinition: PluginDefinition = {
  id: 'entity_age',
  label: 'Entity Age',
  description: 'Calculates entity age and freshness metrics.',
  weight: 110,
  provider: 'content_intel_example',
};

export function freshnessFor(days: number): Freshness {
  if (days <= 1) return 'new';
  if (days <= 7) return 'recent';
  if (days <= 30) return 'current';
  if (days <= 90) return 'aging';
  if (days <= 365) return 'old';
  return 'archival';
}

export class EntityAgePlugin extends BaseIntelPlugin {
  constructor(
    descriptor: PluginDescriptor,
    private readonly clock: Clock
  ) {
    super(descriptor);
  }

  /** Only entities that track their creation time. */
  override applies(entity: ContentEntity): boolean {
    return entity.createdAt !== undefined;
  }

  collect(entity: ContentEntity): IntelData {
    const now = this.clock();
    const data: IntelData = {};

    const { createdAt, changedAt } = entity;
    if (createdAt !== undefined) {
      const age = describeDuration(now - createdAt);
      data.created = describeTimestamp(createdAt);
      data.age = age;
      data.freshness = freshnessFor(age.days);
    }

    if (changedAt !== undefined) {
      data.last_modified = describeTimestamp(changedAt);
      data.time_since_update = describeDuration(now - changedAt);
      if (createdAt !== undefined) {
        data.was_edited = changedAt > createdAt;
      }
    }

    return data;
  }
}
