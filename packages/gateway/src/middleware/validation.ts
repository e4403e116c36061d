/**
 * Request validation using Zod
 *
 * Schemas for the JSON bodies the API accepts. Filter lists are checked
 * again by parseFilterList in the routes, so here they only need a shape.
 */

import { z } from 'zod';
import { ValidationError } from '@content-intel/core';
import { MAX_BATCH_IDS, MAX_PAGE_SIZE } from '../config/defaults.js';

const ENTITY_ID = /^[A-Za-z0-9_-]{1,128}$/;

const filterListSchema = z.union([z.string().max(2000), z.array(z.string().max(200)).max(200)]);

// ─── Batch Schemas ───────────────────────────────────────────────

export const batchRequestSchema = z.object({
  ids: z
    .array(
      z.union([
        z.string().regex(ENTITY_ID, 'Entity ids must be plain identifiers'),
        z.number().int().nonnegative(),
      ]).transform(String)
    )
    .max(MAX_BATCH_IDS)
    .optional(),
  bundle: z.string().min(1).max(128).optional(),
  limit: z.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
  fields: filterListSchema.optional(),
  plugins: filterListSchema.optional(),
});

export type BatchRequest = z.infer<typeof batchRequestSchema>;

// ─── Settings Schemas ────────────────────────────────────────────

export const enabledPluginsSchema = z.object({
  plugins: z.array(z.string().min(1).max(128)).max(200),
});

// ─── Search Schemas ──────────────────────────────────────────────

export const searchLogSchema = z.object({
  keywords: z.string().max(1000),
  resultsCount: z.number().int().min(0),
  indexId: z.string().max(64).nullable().optional(),
});

// ─── Validation Helper ──────────────────────────────────────────

/**
 * Validate request body against a Zod schema.
 * Returns parsed data on success.
 * @throws ValidationError listing every issue
 */
export function validateBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const errors = result.error.issues.map((issue) => ({
      path: issue.path.map(String),
      message: issue.message,
    }));
    const summary = errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ValidationError(`Validation failed: ${summary}`, { errors });
  }
  return result.data;
}
