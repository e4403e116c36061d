/**
 * Search query intelligence: which searches are popular, and which ones
 * keep coming back with (almost) nothing.
 */

export type SearchQuerySource = 'content_intel' | 'search_api_log' | 'none';

export interface SearchTimestamp {
  timestamp: number;
  iso8601: string;
  human: string;
}

export interface SearchQueryRow {
  query: string;
  count: number;
  /** Average result count; null when the source does not record it */
  resultsCount: number | null;
  lastSearched: SearchTimestamp | null;
  isContentGap?: boolean;
}

export interface ISearchQueryCollector {
  /** Detected once, then cached */
  getSource(): Promise<SearchQuerySource>;
  isAvailable(): Promise<boolean>;
  getTopQueries(limit?: number): Promise<SearchQueryRow[]>;
  /** Queries whose average result count is at most `maxResults` */
  getContentGaps(limit?: number, maxResults?: number): Promise<SearchQueryRow[]>;
  logQuery(keywords: string, resultsCount: number, indexId?: string | null): Promise<void>;
}

export const DEFAULT_SEARCH_QUERY_LIMIT = 50;
export const MAX_KEYWORDS_LENGTH = 255;

/**
 * Trimmed keywords cut to the stored column width; null when blank.
 */
export function normalizeKeywords(keywords: string): string | null {
  const trimmed = keywords.trim();
  if (trimmed === '') return null;
  // Slice by code point so a surrogate pair is never split
  return Array.from(trimmed).slice(0, MAX_KEYWORDS_LENGTH).join('');
}
