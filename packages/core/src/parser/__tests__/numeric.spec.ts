import { describe, it, expect } from 'vitest';
import { Decimal } from 'decimal.js';
import { InvalidAmountError, UnsupportedValueTypeError } from '../../errors/index.js';
import { fromDecimal, fromDecimalString, fromInteger, fromNumber, fromNumeric } from '../numeric.js';
import { JPY, USD } from './fixtures.js';

describe('Numeric entry points', () => {
  describe('fromInteger', () => {
    it('multiplies whole units by the subunit ratio', () => {
      expect(fromInteger(12, USD)).toBe(1200n);
      expect(fromInteger(12n, JPY)).toBe(12n);
      expect(fromInteger(-3, USD)).toBe(-300n);
    });

    it('rejects numbers that are not safe integers', () => {
      expect(() => fromInteger(1.5, USD)).toThrow(UnsupportedValueTypeError);
    });
  });

  describe('fromDecimal', () => {
    it('rounds half away from zero', () => {
      expect(fromDecimal(new Decimal('1.005'), USD)).toBe(101n);
      expect(fromDecimal(new Decimal('-1.005'), USD)).toBe(-101n);
      expect(fromDecimal(new Decimal('1.004'), USD)).toBe(100n);
    });

    it('keeps the exact value with infinite precision', () => {
      expect(fromDecimal(new Decimal('1.005'), USD, { infinitePrecision: true }).toString()).toBe('100.5');
    });

    it('rejects non-finite decimals', () => {
      expect(() => fromDecimal(new Decimal(NaN), USD)).toThrow(UnsupportedValueTypeError);
    });
  });

  describe('fromDecimalString', () => {
    it('parses plain decimal strings', () => {
      expect(fromDecimalString('1234.5', JPY)).toBe(1235n);
      expect(fromDecimalString(' 12.34 ', USD)).toBe(1234n);
      expect(fromDecimalString('1e3', USD)).toBe(100000n);
    });

    it('throws InvalidAmountError for other text', () => {
      expect(() => fromDecimalString('twelve', USD)).toThrow(InvalidAmountError);
      expect(() => fromDecimalString('Infinity', USD)).toThrow('Invalid decimal amount (not finite)');
    });

    it('returns an unsigned zero for "-0" with infinite precision', () => {
      const result = fromDecimalString('-0', USD, { infinitePrecision: true });
      expect(result.isZero()).toBe(true);
      expect(result.isNeg()).toBe(false);
    });
  });

  describe('fromNumber', () => {
    it('reads floats through their decimal form', () => {
      expect(fromNumber(0.1, USD)).toBe(10n);
      expect(fromNumber(19.99, USD)).toBe(1999n);
    });

    it('keeps the exact value with infinite precision', () => {
      expect(fromNumber(0.125, USD, { infinitePrecision: true }).toString()).toBe('12.5');
      expect(fromNumber(3, USD, { infinitePrecision: true }).toString()).toBe('300');
    });

    it('rejects NaN and infinities', () => {
      expect(() => fromNumber(Number.NaN, USD)).toThrow(UnsupportedValueTypeError);
      expect(() => fromNumber(Number.POSITIVE_INFINITY, USD)).toThrow(UnsupportedValueTypeError);
    });
  });

  describe('fromNumeric', () => {
    it('dispatches on bigint, number and Decimal', () => {
      expect(fromNumeric(5n, USD)).toBe(500n);
      expect(fromNumeric(12.5, USD)).toBe(1250n);
      expect(fromNumeric(new Decimal('0.015'), USD)).toBe(2n);
    });

    it('returns decimals with infinite precision', () => {
      expect(fromNumeric(5n, USD, { infinitePrecision: true }).toString()).toBe('500');
      expect(fromNumeric(7, JPY, { infinitePrecision: true }).toString()).toBe('7');
    });

    it.each([['12'], [null], [undefined], [{ amount: 1 }]])('rejects %j', (value) => {
      expect(() => fromNumeric(value, USD)).toThrow("'value' should be a type of Numeric");
    });
  });
});
