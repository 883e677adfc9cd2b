import { describe, it, expect } from 'vitest';
import { ValidationError } from '@salesim/shared';
import { generateSalesHistorySchema, parseInput, parseIntegerFlag } from '../validation';

describe('parseIntegerFlag', () => {
  it('returns undefined when the flag is absent', () => {
    expect(parseIntegerFlag('seed', undefined)).toBeUndefined();
  });

  it('parses integers, including zero and negatives', () => {
    expect(parseIntegerFlag('seed', '20260224')).toBe(20260224);
    expect(parseIntegerFlag('seed', '0')).toBe(0);
    expect(parseIntegerFlag('seed', '-5')).toBe(-5);
  });

  it.each(['', '  ', 'abc', '1.5', '1e3'])('rejects %j', (value) => {
    expect(() => parseIntegerFlag('seed', value)).toThrow(ValidationError);
  });

  it('names the flag in the error', () => {
    expect(() => parseIntegerFlag('days', '')).toThrow('--days must be an integer');
  });
});

describe('parseInput', () => {
  it('applies defaults', () => {
    expect(parseInput(generateSalesHistorySchema, {})).toEqual({ clearExisting: false });
  });

  it('reports the failing field', () => {
    try {
      parseInput(generateSalesHistorySchema, { windowDays: 0 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.details?.map((d) => d.field)).toEqual(['windowDays']);
      }
    }
  });
});
