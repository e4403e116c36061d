/**
 * View Statistics Repository (PostgreSQL)
 *
 * Read side of the node_counter table.
 */

import { z } from 'zod';
import type { IViewStatisticsSource, ViewStatistics } from '@content-intel/core';
import { BaseRepository } from './base.js';
import { intColumn } from './columns.js';

const counterRow = z.object({
  totalcount: intColumn,
  daycount: intColumn,
  timestamp: intColumn,
});

export class StatisticsRepository extends BaseRepository implements IViewStatisticsSource {
  /**
   * Whether the counter table is present in this database.
   */
  isInstalled(): Promise<boolean> {
    return this.tableExists('node_counter');
  }

  async fetchView(entityId: string): Promise<ViewStatistics | null> {
    const row = await this.queryOne(
      counterRow,
      'SELECT totalcount, daycount, "timestamp" FROM node_counter WHERE nid = ?',
      [entityId]
    );
    if (!row) return null;
    return { totalCount: row.totalcount, dayCount: row.daycount, timestamp: row.timestamp };
  }
}
