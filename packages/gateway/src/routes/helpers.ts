/**
 * Route Helpers
 *
 * Shared utilities for Hono route handlers.
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import {
  Services,
  ValidationError,
  getServiceRegistry,
  parseFilterList,
  unwrap,
  type ContentIntelService,
} from '@content-intel/core';
import type { ApiResponse } from '../types/index.js';
import { ERROR_CODES, type ErrorCode } from './error-codes.js';

// Re-export error codes for convenience
export { ERROR_CODES, type ErrorCode };

/**
 * The intel service registered at bootstrap.
 */
export function getIntel(): ContentIntelService {
  return getServiceRegistry().get(Services.Intel);
}

/**
 * Parse integer query parameter with default and optional min/max bounds.
 * Missing or non-numeric values fall back to the default.
 */
export function getIntParam(
  c: Context,
  name: string,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  let value = parseInt(c.req.query(name) ?? String(defaultValue), 10);
  if (Number.isNaN(value)) value = defaultValue;

  if (min !== undefined) value = Math.max(min, value);
  if (max !== undefined) value = Math.min(max, value);

  return value;
}

/**
 * Parse a field or plugin filter from repeated and/or comma-separated
 * query values (`?plugins=a,b&plugins=c`).
 * @throws ValidationError when an id is malformed
 */
export function getFilterParam(c: Context, name: string): string[] {
  return unwrap(parseFilterList(c.req.queries(name), name));
}

/**
 * Optional non-empty string query parameter.
 */
export function getStringParam(c: Context, name: string): string | null {
  const value = c.req.query(name)?.trim();
  return value ? value : null;
}

/**
 * Entity ids are kept as strings but must be plain identifiers.
 * @throws ValidationError otherwise
 */
export function requireEntityId(id: string): string {
  if (!/^[A-Za-z0-9_-]{1,128}$/.test(id)) {
    throw new ValidationError(`Invalid entity id: ${sanitizeId(id)}`, { field: 'id' });
  }
  return id;
}

/**
 * Build and return a success API response with standard meta envelope.
 */
export function apiResponse<T>(c: Context, data: T, status?: ContentfulStatusCode) {
  const response: ApiResponse<T> = {
    success: true,
    data,
    meta: {
      requestId: c.get('requestId') ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };
  return status ? c.json(response, status) : c.json(response);
}

/**
 * Build and return an error API response with standard meta envelope.
 *
 * @example
 * return apiError(c, 'Invalid input', 400);
 * return apiError(c, { code: ERROR_CODES.NOT_FOUND, message: 'Resource not found' }, 404);
 */
export function apiError(
  c: Context,
  error: string | { code: ErrorCode | string; message: string; details?: Record<string, unknown> },
  status: ContentfulStatusCode = 400
) {
  const errorObj = typeof error === 'string'
    ? { code: ERROR_CODES.ERROR, message: error }
    : error;
  const response: ApiResponse = {
    success: false,
    error: errorObj,
    meta: {
      requestId: c.get('requestId') ?? 'unknown',
      timestamp: new Date().toISOString(),
    },
  };
  return c.json(response, status);
}

/**
 * Strips everything but word chars and hyphens, truncated to 100 chars.
 */
export function sanitizeId(id: string): string {
  return id.replace(/[^\w-]/g, '').slice(0, 100);
}

/**
 * Return a standardized validation error response from a Zod safeParse failure.
 */
export function zodValidationError(
  c: Context,
  issues: ReadonlyArray<{ path: PropertyKey[]; message: string }>,
) {
  const summary = issues.map(i => `${i.path.map(String).join('.')}: ${i.message}`).join('; ');
  return apiError(c, { code: ERROR_CODES.INVALID_INPUT, message: `Validation failed: ${summary}` }, 400);
}
