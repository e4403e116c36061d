/**
 * Standardized Error Codes
 *
 * Every code a route or the error handler can put in an error envelope.
 * The AppError codes from core are listed here too, so clients can switch
 * on a single set.
 */

export const ERROR_CODES = {
  // Not Found Errors (404)
  NOT_FOUND: 'NOT_FOUND',
  ENTITY_NOT_FOUND: 'ENTITY_NOT_FOUND',
  UNKNOWN_PLUGIN: 'UNKNOWN_PLUGIN',

  // Validation Errors (400)
  BAD_REQUEST: 'BAD_REQUEST',
  INVALID_INPUT: 'INVALID_INPUT',
  VALIDATION_ERROR: 'VALIDATION_ERROR',

  // Payload Errors (413)
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',

  // Timeout & Conflict (408, 409)
  TIMEOUT: 'TIMEOUT',
  CONFLICT: 'CONFLICT',

  // Service Unavailable (503)
  SERVICE_UNAVAILABLE: 'SERVICE_UNAVAILABLE',
  SEARCH_LOG_UNAVAILABLE: 'SEARCH_LOG_UNAVAILABLE',

  // Server Errors (500)
  ERROR: 'ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
  PLUGIN_COLLECTION_ERROR: 'PLUGIN_COLLECTION_ERROR',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(ERROR_CODES));

export function isValidErrorCode(code: string): code is ErrorCode {
  return KNOWN_CODES.has(code);
}
