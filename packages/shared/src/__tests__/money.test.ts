import { describe, it, expect } from 'vitest';
import {
  toCents,
  toDollars,
  parseCents,
  centsToDecimal,
  lineExtensionCents,
  sumCents,
  formatMoney,
} from '../utils/money';

describe('money utilities', () => {
  describe('toCents / toDollars', () => {
    it('rounds to avoid floating point errors', () => {
      expect(toCents(0.1 + 0.2)).toBe(30);
      expect(toDollars(9999)).toBe(99.99);
    });
  });

  describe('parseCents', () => {
    it('parses numeric column strings exactly', () => {
      expect(parseCents('1500.00')).toBe(150000);
      expect(parseCents('89.9')).toBe(8990);
      expect(parseCents('0.05')).toBe(5);
      expect(parseCents('42')).toBe(4200);
      expect(parseCents('-12.5')).toBe(-1250);
    });

    it('rounds numbers to the cent', () => {
      expect(parseCents(19.99)).toBe(1999);
    });

    it('rejects values that are not decimal amounts', () => {
      expect(() => parseCents('abc')).toThrow(RangeError);
      expect(() => parseCents('1.234')).toThrow(RangeError);
      expect(() => parseCents(Number.NaN)).toThrow(RangeError);
    });
  });

  describe('centsToDecimal', () => {
    it('renders two fraction digits', () => {
      expect(centsToDecimal(150000)).toBe('1500.00');
      expect(centsToDecimal(5)).toBe('0.05');
      expect(centsToDecimal(-1250)).toBe('-12.50');
    });
  });

  describe('lineExtensionCents / sumCents', () => {
    it('multiplies and sums in integer cents', () => {
      expect(lineExtensionCents(1999, 3)).toBe(5997);
      expect(sumCents([lineExtensionCents(10, 3), lineExtensionCents(20, 1)])).toBe(50);
      expect(sumCents([])).toBe(0);
    });
  });

  describe('formatMoney', () => {
    it('formats cents as dollars with grouping', () => {
      expect(formatMoney(123456789)).toBe('$1,234,567.89');
      expect(formatMoney(0)).toBe('$0.00');
      expect(formatMoney(-1250)).toBe('-$12.50');
    });
  });
});
