import { ValidationError } from '../types/errors.js';
import { err, ok, type Result } from '../types/result.js';

const FILTER_ID = /^[A-Za-z0-9_-]+$/;

/**
 * Parse a field or plugin filter given as `"a,b"` or `["a", "b,c"]`.
 * Blank entries are skipped and duplicates removed; any other id must be
 * made of letters, digits, `_` or `-`.
 */
export function parseFilterList(
  input: string | readonly string[] | undefined,
  name = 'filter'
): Result<string[], ValidationError> {
  if (input === undefined) return ok([]);

  const raw = typeof input === 'string' ? [input] : input;
  const ids = raw
    .flatMap((chunk) => chunk.split(','))
    .map((id) => id.trim())
    .filter((id) => id !== '');

  const invalid = ids.filter((id) => !FILTER_ID.test(id));
  if (invalid.length > 0) {
    return err(
      new ValidationError(`Invalid ${name}: ${invalid.join(', ')}`, {
        field: name,
        errors: invalid.map((id) => ({ path: [name], message: `"${id}" is not a valid identifier` })),
      })
    );
  }
  return ok([...new Set(ids)]);
}
