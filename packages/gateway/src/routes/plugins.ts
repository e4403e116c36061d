/**
 * Intel plugin catalogue routes
 */

import { Hono } from 'hono';
import { UnknownPluginError } from '@content-intel/core';
import { apiResponse, getIntel } from './helpers.js';

export const pluginsRoutes = new Hono();

/**
 * Every discovered plugin, whatever the allow-list says
 */
pluginsRoutes.get('/', (c) => {
  return apiResponse(c, getIntel().getPlugins());
});

pluginsRoutes.get('/:id', async (c) => {
  const id = c.req.param('id');
  const intel = getIntel();
  const plugin = intel.getPlugins().find((info) => info.id === id);
  if (!plugin) {
    throw new UnknownPluginError(id);
  }
  const enabled = await intel.getEnabledPlugins();
  return apiResponse(c, { ...plugin, enabled: enabled.length === 0 || enabled.includes(id) });
});
