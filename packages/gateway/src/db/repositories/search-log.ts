/**
 * Search Log Repository (PostgreSQL)
 *
 * Popular queries and content gaps from whichever search log exists:
 * our own content_intel_search_log table, or a search_api_log table.
 */

import { z } from 'zod';
import {
  DEFAULT_SEARCH_QUERY_LIMIT,
  formatMediumDate,
  normalizeKeywords,
  systemClock,
  toIso8601,
  type Clock,
  type ISearchQueryCollector,
  type SearchQueryRow,
  type SearchQuerySource,
  type SearchTimestamp,
} from '@content-intel/core';
import { BaseRepository } from './base.js';
import type { DatabaseAdapter } from '../adapters/types.js';
import { intColumn, nullableIntColumn, nullableNumericColumn, textColumn } from './columns.js';
import { getLog } from '../../services/log.js';

const log = getLog('SearchLogRepo');

export const SEARCH_LOG_TABLE = 'content_intel_search_log';
export const SEARCH_API_LOG_TABLE = 'search_api_log';

const aggregateRow = z.object({
  keywords: textColumn,
  count: intColumn,
  avg_results: nullableNumericColumn.optional(),
  last_searched: nullableIntColumn,
});
type AggregateRow = z.infer<typeof aggregateRow>;

function searchTimestamp(timestamp: number | null): SearchTimestamp | null {
  if (!timestamp) return null;
  const iso8601 = toIso8601(timestamp);
  const human = formatMediumDate(timestamp);
  if (iso8601 === null || human === null) return null;
  return { timestamp, iso8601, human };
}

function toQueryRow(row: AggregateRow, contentGap: boolean): SearchQueryRow {
  const average = row.avg_results ?? null;
  const result: SearchQueryRow = {
    query: row.keywords,
    count: row.count,
    resultsCount: average === null ? null : Math.round(average),
    lastSearched: searchTimestamp(row.last_searched),
  };
  if (contentGap) {
    result.isContentGap = true;
  }
  return result;
}

export class SearchLogRepository extends BaseRepository implements ISearchQueryCollector {
  private source: Promise<SearchQuerySource> | null = null;

  constructor(
    adapter: DatabaseAdapter | null = null,
    private readonly clock: Clock = systemClock
  ) {
    super(adapter);
  }

  /**
   * Detected on first use, then cached.
   */
  getSource(): Promise<SearchQuerySource> {
    if (!this.source) {
      this.source = this.detectSource().catch((error: unknown) => {
        this.source = null;
        throw error;
      });
    }
    return this.source;
  }

  async isAvailable(): Promise<boolean> {
    return (await this.getSource()) !== 'none';
  }

  async getTopQueries(limit: number = DEFAULT_SEARCH_QUERY_LIMIT): Promise<SearchQueryRow[]> {
    switch (await this.getSource()) {
      case 'content_intel': {
        const rows = await this.query(
          aggregateRow,
          `SELECT keywords, COUNT(*) AS count, AVG(results_count) AS avg_results, MAX("timestamp") AS last_searched
           FROM ${SEARCH_LOG_TABLE}
           GROUP BY keywords
           ORDER BY count DESC, keywords ASC
           LIMIT ?`,
          [limit]
        );
        return rows.map((row) => toQueryRow(row, false));
      }
      case 'search_api_log': {
        if (!(await this.columnExists(SEARCH_API_LOG_TABLE, 'keywords'))) return [];
        const rows = await this.query(
          aggregateRow,
          `SELECT keywords, COUNT(*) AS count, MAX("timestamp") AS last_searched
           FROM ${SEARCH_API_LOG_TABLE}
           GROUP BY keywords
           ORDER BY count DESC, keywords ASC
           LIMIT ?`,
          [limit]
        );
        return rows.map((row) => toQueryRow(row, false));
      }
      case 'none':
        return [];
    }
  }

  async getContentGaps(limit: number = DEFAULT_SEARCH_QUERY_LIMIT, maxResults = 0): Promise<SearchQueryRow[]> {
    switch (await this.getSource()) {
      case 'content_intel': {
        const rows = await this.query(
          aggregateRow,
          `SELECT keywords, COUNT(*) AS count, AVG(results_count) AS avg_results, MAX("timestamp") AS last_searched
           FROM ${SEARCH_LOG_TABLE}
           GROUP BY keywords
           HAVING AVG(results_count) <= ?
           ORDER BY count DESC, keywords ASC
           LIMIT ?`,
          [maxResults, limit]
        );
        return rows.map((row) => toQueryRow(row, true));
      }
      case 'search_api_log': {
        if (!(await this.columnExists(SEARCH_API_LOG_TABLE, 'num_results'))) return [];
        const rows = await this.query(
          aggregateRow,
          `SELECT keywords, COUNT(*) AS count, AVG(num_results) AS avg_results, MAX("timestamp") AS last_searched
           FROM ${SEARCH_API_LOG_TABLE}
           GROUP BY keywords
           HAVING AVG(num_results) <= ?
           ORDER BY count DESC, keywords ASC
           LIMIT ?`,
          [maxResults, limit]
        );
        return rows.map((row) => toQueryRow(row, true));
      }
      case 'none':
        return [];
    }
  }

  /**
   * Record a search. Only our own log table accepts writes; blank keywords are dropped.
   */
  async logQuery(keywords: string, resultsCount: number, indexId: string | null = null): Promise<void> {
    if ((await this.getSource()) !== 'content_intel') {
      log.debug('Search logging skipped, no writable search log');
      return;
    }

    const normalized = normalizeKeywords(keywords);
    if (normalized === null) return;

    await this.execute(
      `INSERT INTO ${SEARCH_LOG_TABLE} (keywords, results_count, index_id, "timestamp") VALUES (?, ?, ?, ?)`,
      [normalized, resultsCount, indexId, this.clock()]
    );
  }

  private async detectSource(): Promise<SearchQuerySource> {
    let source: SearchQuerySource = 'none';
    if (await this.tableExists(SEARCH_LOG_TABLE)) {
      source = 'content_intel';
    } else if (await this.tableExists(SEARCH_API_LOG_TABLE)) {
      source = 'search_api_log';
    }
    log.info('Search log source detected', { source });
    return source;
  }
}
