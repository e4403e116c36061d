/**
 * Commander option parsers
 */

import { InvalidArgumentError } from 'commander';
import { parseFilterList, unwrap } from '@content-intel/core';

function parseInteger(value: string, min: number): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new InvalidArgumentError(`Expected an integer >= ${min}, got "${value}".`);
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  return parseInteger(value, 1);
}

export function parseNonNegativeInt(value: string): number {
  return parseInteger(value, 0);
}

/**
 * Comma-separated id list (`--plugins word_count,entity_age`).
 * @throws ValidationError when an id is malformed
 */
export function filterList(value: string | undefined, name: string): string[] {
  return unwrap(parseFilterList(value, name));
}
