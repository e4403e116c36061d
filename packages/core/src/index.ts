/**
 * @content-intel/core
 *
 * Plugin registry, aggregation pipeline and service facade for content intel.
 * Zero runtime dependencies; storage comes in through the collaborator interfaces.
 *
 * @packageDocumentation
 */

// Types
export * from './types/index.js';

// Services (ServiceRegistry, tokens, logging, settings)
export * from './services/index.js';

// Entity model and collaborator interfaces
export * from './entities/index.js';

// Intel registry, collector and facade
export * from './intel/index.js';

// Built-in intel plugins
export * from './plugins/index.js';

// Version
export const VERSION = '0.1.0';
