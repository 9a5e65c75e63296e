import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  formatDecimal,
  parseFiniteDecimal,
  roundAmount,
  roundDecimal,
  roundPercent,
  tryParseDecimal,
} from '../decimal-utils.js';

describe('Decimal Utilities', () => {
  describe('tryParseDecimal', () => {
    it('should parse valid string to Decimal', () => {
      const out = { value: new Decimal(0) };
      const result = tryParseDecimal('123.456', out);

      expect(result).toBe(true);
      expect(out.value.toString()).toBe('123.456');
    });

    it('should parse numbers and Decimal instances', () => {
      const out = { value: new Decimal(0) };

      expect(tryParseDecimal(42.5, out)).toBe(true);
      expect(out.value.toString()).toBe('42.5');

      expect(tryParseDecimal(new Decimal('789.012'), out)).toBe(true);
      expect(out.value.toString()).toBe('789.012');
    });

    it('should trim whitespace around numeric strings', () => {
      const out = { value: new Decimal(0) };

      expect(tryParseDecimal('  995 ', out)).toBe(true);
      expect(out.value.toString()).toBe('995');
    });

    it('should treat missing values as unparseable', () => {
      expect(tryParseDecimal(undefined)).toBe(false);
      expect(tryParseDecimal(null)).toBe(false);
      expect(tryParseDecimal('')).toBe(false);
      expect(tryParseDecimal('   ')).toBe(false);
    });

    it('should reject non-finite values', () => {
      expect(tryParseDecimal(Number.NaN)).toBe(false);
      expect(tryParseDecimal(Number.POSITIVE_INFINITY)).toBe(false);
      expect(tryParseDecimal('Infinity')).toBe(false);
    });

    it('should reject garbage strings', () => {
      expect(tryParseDecimal('12abc')).toBe(false);
    });
  });

  describe('parseFiniteDecimal', () => {
    it('should return the Decimal for valid input', () => {
      expect(parseFiniteDecimal('0.62')?.toString()).toBe('0.62');
    });

    it('should return undefined for invalid input', () => {
      expect(parseFiniteDecimal('n/a')).toBeUndefined();
      expect(parseFiniteDecimal(null)).toBeUndefined();
    });
  });

  describe('rounding', () => {
    it('should round half-up away from zero', () => {
      expect(roundDecimal(new Decimal('1.25'), 1).toString()).toBe('1.3');
      expect(roundDecimal(new Decimal('-1.25'), 1).toString()).toBe('-1.3');
    });

    it('should round amounts to 8 decimal places', () => {
      expect(roundAmount(new Decimal('0.123456785')).toString()).toBe('0.12345679');
      expect(roundAmount(new Decimal('123456789.123456789')).toString()).toBe('123456789.12345679');
    });

    it('should round percentages to 4 decimal places', () => {
      expect(roundPercent(new Decimal(50).div(3100).times(100)).toString()).toBe('1.6129');
    });
  });

  describe('formatDecimal', () => {
    it('should strip trailing zeros', () => {
      expect(formatDecimal(new Decimal('5.50000000'))).toBe('5.5');
      expect(formatDecimal(new Decimal('3100'))).toBe('3100');
    });

    it('should respect the maximum decimal places', () => {
      expect(formatDecimal(new Decimal('1.61290322'), 2)).toBe('1.61');
    });

    it('should keep integers intact when no decimal places are requested', () => {
      expect(formatDecimal(new Decimal('100'), 0)).toBe('100');
    });
  });
});
