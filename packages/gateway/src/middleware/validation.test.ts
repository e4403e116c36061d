import { describe, it, expect } from 'vitest';
import { ValidationError } from '@content-intel/core';
import { batchRequestSchema, enabledPluginsSchema, searchLogSchema, validateBody } from './validation.js';

describe('batchRequestSchema', () => {
  it('accepts an empty body', () => {
    expect(validateBody(batchRequestSchema, {})).toEqual({});
  });

  it('normalizes numeric ids to strings', () => {
    const body = validateBody(batchRequestSchema, { ids: [3, '7', 'abc-1'], plugins: 'word_count' });
    expect(body).toEqual({ ids: ['3', '7', 'abc-1'], plugins: 'word_count' });
  });

  it('accepts filter arrays', () => {
    const body = validateBody(batchRequestSchema, { bundle: 'article', limit: 5, fields: ['title', 'body'] });
    expect(body).toEqual({ bundle: 'article', limit: 5, fields: ['title', 'body'] });
  });

  it('rejects malformed ids', () => {
    expect(() => validateBody(batchRequestSchema, { ids: ['1; DROP'] })).toThrow(ValidationError);
  });

  it('rejects out-of-range limits', () => {
    expect(() => validateBody(batchRequestSchema, { limit: 0 })).toThrow(/^Validation failed: limit: /);
    expect(() => validateBody(batchRequestSchema, { limit: 1.5 })).toThrow(ValidationError);
  });

  it('caps the number of ids', () => {
    const ids = Array.from({ length: 101 }, (_, i) => i + 1);
    expect(() => validateBody(batchRequestSchema, { ids })).toThrow(ValidationError);
  });
});

describe('enabledPluginsSchema', () => {
  it('requires a plugins array', () => {
    expect(validateBody(enabledPluginsSchema, { plugins: [] })).toEqual({ plugins: [] });
    expect(() => validateBody(enabledPluginsSchema, {})).toThrow(ValidationError);
    expect(() => validateBody(enabledPluginsSchema, { plugins: 'word_count' })).toThrow(ValidationError);
  });
});

describe('searchLogSchema', () => {
  it('takes keywords and a result count', () => {
    expect(validateBody(searchLogSchema, { keywords: 'annual report', resultsCount: 0 })).toEqual({
      keywords: 'annual report',
      resultsCount: 0,
    });
  });

  it('rejects negative counts', () => {
    expect(() => validateBody(searchLogSchema, { keywords: 'x', resultsCount: -1 })).toThrow(ValidationError);
  });
});

describe('validateBody', () => {
  it('lists every issue with its path', () => {
    try {
      validateBody(searchLogSchema, { keywords: 5 });
      expect.fail('expected a ValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.errors?.map((issue) => issue.path.join('.'))).toEqual(['keywords', 'resultsCount']);
      }
    }
  });
});
