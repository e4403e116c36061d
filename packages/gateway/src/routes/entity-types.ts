/**
 * Entity type, bundle and field introspection routes
 */

import { Hono } from 'hono';
import { apiResponse, getIntel, getStringParam } from './helpers.js';

export const entityTypeRoutes = new Hono();

entityTypeRoutes.get('/', async (c) => {
  return apiResponse(c, await getIntel().getEntityTypes());
});

entityTypeRoutes.get('/:type/bundles', async (c) => {
  return apiResponse(c, await getIntel().getBundles(c.req.param('type')));
});

/**
 * Base fields, or a bundle's fields when ?bundle= is given
 */
entityTypeRoutes.get('/:type/fields', async (c) => {
  return apiResponse(c, await getIntel().getFields(c.req.param('type'), getStringParam(c, 'bundle')));
});
