import type { ContentEntity } from '../entities/types.js';
import { BaseIntelPlugin } from '../intel/plugin-base.js';
import { describeTimestamp } from '../intel/format.js';
import type { PluginDefinition, PluginDescriptor } from '../intel/types.js';
import type { IntelData } from '../types/json.js';

export interface ViewStatistics {
  totalCount: number;
  dayCount: number;
  /** Unix seconds of the last view, 0 when never viewed */
  timestamp: number;
}

/**
 * Read side of the node view counter.
 */
export interface IViewStatisticsSource {
  fetchView(entityId: string): Promise<ViewStatistics | null>;
}

export const statisticsDefinition: PluginDefinition = {
  id: 'statistics',
  label: 'View Statistics',
  description: 'Page view counts from the node view counter.',
  entityTypes: ['node'],
  weight: 10,
  provider: 'content_intel',
};

export class StatisticsPlugin extends BaseIntelPlugin {
  constructor(
    descriptor: PluginDescriptor,
    private readonly source: IViewStatisticsSource | null
  ) {
    super(descriptor);
  }

  override isAvailable(): boolean {
    return this.source !== null;
  }

  async collect(entity: ContentEntity): Promise<IntelData> {
    if (!this.source) return {};

    const views = await this.source.fetchView(entity.id);
    if (!views) {
      return { total_views: 0, day_views: 0, last_view: null };
    }

    return {
      total_views: views.totalCount,
      day_views: views.dayCount,
      last_view: views.timestamp ? describeTimestamp(views.timestamp) : null,
    };
  }
}
