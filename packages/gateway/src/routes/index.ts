/**
 * Route exports
 */

export { healthRoutes } from './health.js';
export { entityTypeRoutes } from './entity-types.js';
export { pluginsRoutes } from './plugins.js';
export { settingsRoutes } from './settings.js';
export { entityRoutes } from './entities.js';
export { searchRoutes } from './search.js';
export { apiResponse, apiError, getIntel, ERROR_CODES, type ErrorCode } from './helpers.js';
