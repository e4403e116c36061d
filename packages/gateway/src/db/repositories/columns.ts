/**
 * Column parsers shared by the repositories.
 *
 * pg returns BIGINT, COUNT(*) and AVG() as strings; these coerce them.
 */

import { z } from 'zod';
import { isIntelObject, isIntelValue, type IntelData } from '@content-intel/core';

export const intColumn = z.union([z.number(), z.string()]).pipe(z.coerce.number().int());

export const nullableIntColumn = z
  .union([z.number(), z.string()])
  .nullable()
  .transform((value) => (value === null ? null : Number(value)))
  .refine((value) => value === null || Number.isInteger(value), { message: 'Expected an integer' });

/** AVG() and other NUMERIC results */
export const nullableNumericColumn = z
  .union([z.number(), z.string()])
  .nullable()
  .transform((value) => (value === null ? null : Number(value)))
  .refine((value) => value === null || Number.isFinite(value), { message: 'Expected a number' });

export const intelDataColumn = z.custom<IntelData>(
  (value) => isIntelObject(value) && isIntelValue(value),
  { message: 'Expected a JSON object' }
);

export const textColumn = z.string();
export const nullableTextColumn = z.string().nullable();
