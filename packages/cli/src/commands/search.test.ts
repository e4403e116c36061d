/**
 * Search command tests
 */

import { describe, it, expect, vi, beforeEach, type MockInstance } from 'vitest';
import type { ISearchQueryCollector, SearchQueryRow } from '@content-intel/core';
import { createTestIntel } from '@content-intel/core/test-helpers';

const mockStartIntelRuntime = vi.hoisted(() => vi.fn());
const mockStopIntelRuntime = vi.hoisted(() => vi.fn());

vi.mock('@content-intel/gateway', () => ({
  startIntelRuntime: mockStartIntelRuntime,
  stopIntelRuntime: mockStopIntelRuntime,
}));

import { contentGaps, topQueries } from './search.js';

const annualReport: SearchQueryRow = {
  query: 'annual report',
  count: 3,
  resultsCount: 0,
  lastSearched: {
    timestamp: 1700000000,
    iso8601: '2023-11-14T22:13:20+00:00',
    human: 'Tue, 11/14/2023 - 22:13',
  },
};

describe('Search CLI Commands', () => {
  let searchQueries: ISearchQueryCollector & {
    getTopQueries: ReturnType<typeof vi.fn>;
    getContentGaps: ReturnType<typeof vi.fn>;
  };
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;
  let exitSpy: MockInstance<typeof process.exit>;

  const printed = () => String(logSpy.mock.calls.at(-1)?.[0]);

  beforeEach(() => {
    vi.clearAllMocks();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => undefined as never);

    searchQueries = {
      getSource: vi.fn().mockResolvedValue('content_intel'),
      isAvailable: vi.fn().mockResolvedValue(true),
      getTopQueries: vi.fn().mockResolvedValue([annualReport]),
      getContentGaps: vi.fn().mockResolvedValue([{ ...annualReport, isContentGap: true }]),
      logQuery: vi.fn().mockResolvedValue(undefined),
    };
    const intel = createTestIntel({ searchQueries });

    mockStartIntelRuntime.mockResolvedValue({ intel: intel.service });
    mockStopIntelRuntime.mockResolvedValue(undefined);
  });

  describe('topQueries', () => {
    it('prints a table with the human timestamp', async () => {
      await topQueries({ limit: 5 });

      expect(searchQueries.getTopQueries).toHaveBeenCalledWith(5);
      expect(printed()).toBe(
        [
          'Query          Count  Results  Last searched',
          ['─'.repeat(13), '─'.repeat(5), '─'.repeat(7), '─'.repeat(23)].join('  '),
          'annual report  3      0        Tue, 11/14/2023 - 22:13',
        ].join('\n')
      );
    });

    it('keeps the full timestamp in JSON', async () => {
      await topQueries({ format: 'json' });

      expect(searchQueries.getTopQueries).toHaveBeenCalledWith(50);
      expect(JSON.parse(printed())).toEqual([annualReport]);
    });

    it('exits 1 without a search log', async () => {
      mockStartIntelRuntime.mockResolvedValue({ intel: createTestIntel().service });

      await topQueries();

      expect(errorSpy).toHaveBeenCalledWith('Error: No search log is configured.');
      expect(exitSpy).toHaveBeenCalledWith(1);
    });
  });

  describe('contentGaps', () => {
    it('passes the limit and result threshold through', async () => {
      await contentGaps({ limit: 10, maxResults: 2, format: 'json' });

      expect(searchQueries.getContentGaps).toHaveBeenCalledWith(10, 2);
      expect(JSON.parse(printed())[0].isContentGap).toBe(true);
    });

    it('defaults to zero-result queries', async () => {
      await contentGaps();

      expect(searchQueries.getContentGaps).toHaveBeenCalledWith(50, 0);
    });
  });
});
