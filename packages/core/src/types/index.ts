/**
 * Core types for Content Intel
 * @packageDocumentation
 */

// Result pattern
export { type Result, ok, err, unwrap } from './result.js';

// JSON-shaped intel values
export { type IntelScalar, type IntelValue, type IntelData, isIntelObject, isIntelValue, setEntry } from './json.js';

// Errors
export {
  AppError,
  ValidationError,
  EntityNotFoundError,
  UnknownPluginError,
  PluginCollectionError,
  ConflictError,
  TimeoutError,
  InternalError,
  isAppError,
  toAppError,
  getErrorMessage,
} from './errors.js';

// Async helpers
export { withTimeout } from './utility.js';
