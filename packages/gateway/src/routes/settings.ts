/**
 * Settings routes
 *
 * The enabled-plugin allow-list. An empty list means every plugin runs.
 */

import { Hono } from 'hono';
import { apiResponse, getIntel } from './helpers.js';
import { enabledPluginsSchema, validateBody } from '../middleware/validation.js';

export const settingsRoutes = new Hono();

settingsRoutes.get('/enabled-plugins', async (c) => {
  return apiResponse(c, { plugins: await getIntel().getEnabledPlugins() });
});

settingsRoutes.put('/enabled-plugins', async (c) => {
  const body = validateBody(enabledPluginsSchema, await c.req.json());
  return apiResponse(c, { plugins: await getIntel().setEnabledPlugins(body.plugins) });
});

settingsRoutes.delete('/enabled-plugins', async (c) => {
  return apiResponse(c, { plugins: await getIntel().setEnabledPlugins([]) });
});
