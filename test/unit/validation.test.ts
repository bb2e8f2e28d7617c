/**
 * Validation Helper Tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatValidationErrors,
  idParamsSchema,
  idSchema,
  parseOptionalId,
  productSearchQuerySchema,
} from '../../src/middleware/validation.js';

describe('idSchema', () => {
  it('parses positive integers', () => {
    expect(idSchema.parse('42')).toBe(42);
    expect(idSchema.parse('007')).toBe(7);
  });

  it.each(['0', '-1', '1.5', 'abc', '', '99999999999999999999'])('rejects %j', (value) => {
    expect(idSchema.safeParse(value).success).toBe(false);
  });

  it('reports a readable message', () => {
    const result = idParamsSchema.safeParse({ id: 'x' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual([
        { field: 'id', message: 'ID must be a positive integer' },
      ]);
    }
  });
});

describe('productSearchQuerySchema', () => {
  it('trims the keyword', () => {
    expect(productSearchQuerySchema.parse({ q: '  Honey ' })).toEqual({ q: 'Honey' });
  });

  it('rejects a missing keyword', () => {
    const result = productSearchQuerySchema.safeParse({});
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual([
        { field: 'q', message: 'Please enter a product name to search.' },
      ]);
    }
  });

  it('rejects a blank keyword', () => {
    const result = productSearchQuerySchema.safeParse({ q: '   ' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatValidationErrors(result.error)).toEqual([
        { field: 'q', message: 'Please enter a product name to search.' },
      ]);
    }
  });

  it('accepts long keywords', () => {
    const keyword = 'heirloom '.repeat(30).trim();
    expect(productSearchQuerySchema.parse({ q: keyword })).toEqual({ q: keyword });
  });
});

describe('parseOptionalId', () => {
  it('returns undefined for missing or malformed values', () => {
    expect(parseOptionalId(undefined)).toBeUndefined();
    expect(parseOptionalId('abc')).toBeUndefined();
    expect(parseOptionalId('0')).toBeUndefined();
  });

  it('returns the parsed id', () => {
    expect(parseOptionalId('3')).toBe(3);
  });
});
