/**
 * Search commands - popular queries and content gaps
 */

import { DEFAULT_SEARCH_QUERY_LIMIT, type ContentIntelService, type SearchQueryRow } from '@content-intel/core';
import { parseFormat, print, type OutputFormat, type TableColumn } from '../output.js';
import { withIntel } from '../runtime.js';
import type { FormatOptions } from './schema.js';

const QUERY_COLUMNS: TableColumn[] = [
  { key: 'query', label: 'Query' },
  { key: 'count', label: 'Count' },
  { key: 'resultsCount', label: 'Results' },
  { key: 'lastSearched', label: 'Last searched' },
];

export interface SearchOptions extends FormatOptions {
  limit?: number;
}

export interface GapOptions extends SearchOptions {
  maxResults?: number;
}

function printQueries(rows: SearchQueryRow[], format: OutputFormat): void {
  if (format !== 'table') {
    print(rows, format);
    return;
  }
  // Timestamps collapse to their human form in tables
  print(
    rows.map((row) => ({ ...row, lastSearched: row.lastSearched?.human ?? null })),
    format,
    QUERY_COLUMNS
  );
}

function requireSearchLog(intel: ContentIntelService) {
  if (!intel.searchQueries) {
    throw new Error('No search log is configured.');
  }
  return intel.searchQueries;
}

export async function topQueries(options: SearchOptions = {}): Promise<void> {
  await withIntel(async (intel) => {
    const format = parseFormat(options.format, 'table');
    const rows = await requireSearchLog(intel).getTopQueries(options.limit ?? DEFAULT_SEARCH_QUERY_LIMIT);
    printQueries(rows, format);
  });
}

export async function contentGaps(options: GapOptions = {}): Promise<void> {
  await withIntel(async (intel) => {
    const format = parseFormat(options.format, 'table');
    const rows = await requireSearchLog(intel).getContentGaps(
      options.limit ?? DEFAULT_SEARCH_QUERY_LIMIT,
      options.maxResults ?? 0
    );
    printQueries(rows, format);
  });
}
