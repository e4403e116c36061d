/**
 * Middleware exports
 */

export { requestId } from './request-id.js';
export { timing } from './timing.js';
export { errorHandler, notFoundHandler } from './error-handler.js';
export {
  batchRequestSchema,
  enabledPluginsSchema,
  searchLogSchema,
  validateBody,
  type BatchRequest,
} from './validation.js';
