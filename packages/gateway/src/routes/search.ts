/**
 * Search query intelligence routes
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { DEFAULT_SEARCH_QUERY_LIMIT, normalizeKeywords, type ISearchQueryCollector } from '@content-intel/core';
import { apiError, apiResponse, ERROR_CODES, getIntParam, getIntel } from './helpers.js';
import { searchLogSchema, validateBody } from '../middleware/validation.js';
import { MAX_PAGE_SIZE } from '../config/defaults.js';

export const searchRoutes = new Hono();

function unavailable(c: Context) {
  return apiError(
    c,
    { code: ERROR_CODES.SEARCH_LOG_UNAVAILABLE, message: 'Search query collection is not configured' },
    503
  );
}

function collector(): ISearchQueryCollector | null {
  return getIntel().searchQueries;
}

searchRoutes.get('/top', async (c) => {
  const queries = collector();
  if (!queries) return unavailable(c);

  const limit = getIntParam(c, 'limit', DEFAULT_SEARCH_QUERY_LIMIT, 1, MAX_PAGE_SIZE);
  return apiResponse(c, {
    source: await queries.getSource(),
    queries: await queries.getTopQueries(limit),
  });
});

/**
 * Frequent searches averaging at most `maxResults` results
 */
searchRoutes.get('/gaps', async (c) => {
  const queries = collector();
  if (!queries) return unavailable(c);

  const limit = getIntParam(c, 'limit', DEFAULT_SEARCH_QUERY_LIMIT, 1, MAX_PAGE_SIZE);
  const maxResults = getIntParam(c, 'maxResults', 0, 0);
  return apiResponse(c, {
    source: await queries.getSource(),
    queries: await queries.getContentGaps(limit, maxResults),
  });
});

/**
 * Record a search; only the content_intel log accepts writes
 */
searchRoutes.post('/log', async (c) => {
  const queries = collector();
  if (!queries) return unavailable(c);

  const body = validateBody(searchLogSchema, await c.req.json());
  await queries.logQuery(body.keywords, body.resultsCount, body.indexId ?? null);
  const logged = normalizeKeywords(body.keywords) !== null && (await queries.getSource()) === 'content_intel';
  return apiResponse(c, { logged }, logged ? 201 : 200);
});
