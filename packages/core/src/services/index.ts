/**
 * Services exports
 */

// Service Registry (typed DI container)
export {
  ServiceToken,
  ServiceRegistry,
  initServiceRegistry,
  getServiceRegistry,
  hasServiceRegistry,
  resetServiceRegistry,
} from './registry.js';

// Service Tokens
export { Services } from './tokens.js';

// Logging
export type { ILogService, LogLevel } from './log-service.js';
export { LOG_LEVELS, parseLogLevel } from './log-service.js';
export { getLog } from './get-log.js';

// Settings
export type { IConfigStore } from './config-store.js';
export { ENABLED_PLUGINS_KEY, readStringList } from './config-store.js';

// Time
export type { Clock } from './clock.js';
export { systemClock } from './clock.js';
