/**
 * Entity routes
 *
 * Listing, summaries and intel reports. Filter lists (`fields`, `plugins`)
 * are validated before the collector runs.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { DEFAULT_BATCH_LIMIT, DEFAULT_LIST_LIMIT, parseFilterList, unwrap, ValidationError } from '@content-intel/core';
import {
  apiResponse,
  getFilterParam,
  getIntParam,
  getIntel,
  getStringParam,
  requireEntityId,
} from './helpers.js';
import { batchRequestSchema, validateBody } from '../middleware/validation.js';
import { MAX_PAGE_SIZE } from '../config/defaults.js';

export const entityRoutes = new Hono();

const CONDITION_PARAM = /^filter\[([A-Za-z0-9_]+)\]$/;

/**
 * `?filter[status]=1&filter[uid]=3` as list conditions
 */
function getConditions(c: Context): Record<string, string> {
  const conditions: Record<string, string> = {};
  for (const [key, value] of Object.entries(c.req.query())) {
    const match = CONDITION_PARAM.exec(key);
    if (match?.[1]) {
      conditions[match[1]] = value;
    }
  }
  return conditions;
}

function filterFromBody(value: string | string[] | undefined, name: string): string[] {
  return unwrap(parseFilterList(value, name));
}

/**
 * Entity summaries, newest first
 */
entityRoutes.get('/:type', async (c) => {
  const summaries = await getIntel().listEntities(c.req.param('type'), {
    bundle: getStringParam(c, 'bundle'),
    limit: getIntParam(c, 'limit', DEFAULT_LIST_LIMIT, 1, MAX_PAGE_SIZE),
    offset: getIntParam(c, 'offset', 0, 0),
    conditions: getConditions(c),
  });
  return apiResponse(c, summaries);
});

entityRoutes.get('/:type/:id/summary', async (c) => {
  const intel = getIntel();
  const entity = await intel.requireEntity(c.req.param('type'), requireEntityId(c.req.param('id')));
  return apiResponse(c, intel.getEntitySummary(entity));
});

/**
 * Intel report for one entity (?fields=title,body&plugins=word_count)
 */
entityRoutes.get('/:type/:id/intel', async (c) => {
  const fields = getFilterParam(c, 'fields');
  const plugins = getFilterParam(c, 'plugins');
  const report = await getIntel().collectIntelFor(
    c.req.param('type'),
    requireEntityId(c.req.param('id')),
    fields,
    plugins
  );
  return apiResponse(c, report);
});

/**
 * Reports for explicit ids, or the newest `limit` entities of a bundle
 */
entityRoutes.post('/:type/batch', async (c) => {
  const body = validateBody(batchRequestSchema, await c.req.json());
  if (body.ids && body.ids.length > 0 && (body.bundle !== undefined || body.limit !== undefined)) {
    throw new ValidationError('Pass either ids or bundle/limit, not both', { field: 'ids' });
  }

  const reports = await getIntel().collectBatch(c.req.param('type'), {
    ids: body.ids,
    bundle: body.bundle ?? null,
    limit: body.limit ?? DEFAULT_BATCH_LIMIT,
    fields: filterFromBody(body.fields, 'fields'),
    plugins: filterFromBody(body.plugins, 'plugins'),
  });
  return apiResponse(c, reports);
});
