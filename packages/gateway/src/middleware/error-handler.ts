/**
 * Global error handler middleware
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { ZodError } from 'zod';
import { isAppError, toAppError, ValidationError, type AppError } from '@content-intel/core';
import type { ApiResponse, ApiError } from '../types/index.js';
import { ERROR_CODES } from '../routes/error-codes.js';
import { getLog } from '../services/log.js';

const log = getLog('ErrorHandler');

/**
 * Map HTTP status to error code
 */
function statusToErrorCode(status: number): string {
  switch (status) {
    case 400:
      return ERROR_CODES.BAD_REQUEST;
    case 404:
      return ERROR_CODES.NOT_FOUND;
    case 408:
      return ERROR_CODES.TIMEOUT;
    case 409:
      return ERROR_CODES.CONFLICT;
    case 413:
      return ERROR_CODES.PAYLOAD_TOO_LARGE;
    case 422:
      return ERROR_CODES.VALIDATION_ERROR;
    case 503:
      return ERROR_CODES.SERVICE_UNAVAILABLE;
    default:
      return ERROR_CODES.INTERNAL_ERROR;
  }
}

function toContentfulStatus(status: number): ContentfulStatusCode {
  switch (status) {
    case 400:
    case 404:
    case 408:
    case 409:
    case 413:
    case 422:
    case 503:
      return status;
    default:
      return 500;
  }
}

function errorResponse(c: Context, error: ApiError, status: ContentfulStatusCode): Response {
  const response: ApiResponse = {
    success: false,
    error,
    meta: {
      requestId: c.get('requestId') ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };
  return c.json(response, status);
}

function appErrorDetails(err: AppError): Record<string, unknown> | undefined {
  if (err instanceof ValidationError && (err.field !== undefined || err.errors !== undefined)) {
    return { field: err.field, errors: err.errors };
  }
  return undefined;
}

/**
 * Global error handler
 */
export function errorHandler(err: Error, c: Context): Response {
  const requestId = c.get('requestId') ?? 'unknown';

  // Application errors carry their own code and status
  if (isAppError(err)) {
    const status = toContentfulStatus(err.statusCode);
    if (status >= 500) {
      log.error(`[${requestId}] ${err.code}`, err);
    }
    return errorResponse(c, { code: err.code, message: err.message, details: appErrorDetails(err) }, status);
  }

  // Handle HTTP exceptions (from Hono)
  if (err instanceof HTTPException) {
    return errorResponse(c, { code: statusToErrorCode(err.status), message: err.message }, toContentfulStatus(err.status));
  }

  if (err instanceof ZodError) {
    const summary = err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return errorResponse(c, { code: ERROR_CODES.VALIDATION_ERROR, message: `Validation failed: ${summary}` }, 400);
  }

  // Handle JSON parse errors (malformed request body)
  if (err instanceof SyntaxError && err.message.includes('JSON')) {
    return errorResponse(c, { code: ERROR_CODES.BAD_REQUEST, message: 'Invalid JSON in request body' }, 400);
  }

  // Anything else is wrapped as an InternalError
  const internal = toAppError(err);
  log.error(`[${requestId}] Unexpected error:`, err);

  return errorResponse(
    c,
    {
      code: internal.code,
      message: 'An unexpected error occurred',
      // Only expose error message in development, never stack traces
      details: process.env.NODE_ENV === 'development' ? { message: internal.message } : undefined,
    },
    toContentfulStatus(internal.statusCode)
  );
}

/**
 * Not found handler
 */
export function notFoundHandler(c: Context): Response {
  return errorResponse(
    c,
    {
      code: ERROR_CODES.NOT_FOUND,
      message: `Route not found: ${c.req.method} ${c.req.path.replace(/[^\w/.\-~%]/g, '')}`,
    },
    404
  );
}
