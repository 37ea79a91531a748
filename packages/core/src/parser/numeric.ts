/**
 * Numeric entry points
 *
 * Build subunit counts from values that are already numbers, bypassing text parsing.
 */

import { Decimal } from 'decimal.js';
import { InvalidAmountError, UnsupportedValueTypeError } from '../errors/index.js';
import type { CurrencyContext } from '../interfaces/index.js';
import { ExactDecimal } from './exact-decimal.js';
import type { SubunitOptions } from './subunits.js';

/**
 * Whole units to subunits ("12" USD → 1200)
 */
export function fromInteger(value: bigint | number, currency: CurrencyContext): bigint {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new UnsupportedValueTypeError(`'value' should be a safe integer, got ${value}`);
  }
  return BigInt(value) * BigInt(currency.subunitToUnit);
}

/**
 * Scale a decimal amount to subunits, rounding half away from zero
 * unless infinite precision is requested
 */
export function fromDecimal(value: Decimal, currency: CurrencyContext, options: SubunitOptions & { infinitePrecision: true }): Decimal;
export function fromDecimal(value: Decimal, currency: CurrencyContext, options?: SubunitOptions & { infinitePrecision?: false }): bigint;
export function fromDecimal(value: Decimal, currency: CurrencyContext, options?: SubunitOptions): bigint | Decimal;
export function fromDecimal(value: Decimal, currency: CurrencyContext, options: SubunitOptions = {}): bigint | Decimal {
  if (!value.isFinite()) {
    throw new UnsupportedValueTypeError(`'value' should be a finite number, got ${value.toString()}`);
  }
  const scaled = new ExactDecimal(value).times(currency.subunitToUnit);
  if (options.infinitePrecision) return scaled.isZero() ? scaled.abs() : scaled;
  return BigInt(scaled.toDecimalPlaces(0, Decimal.ROUND_HALF_UP).toFixed(0));
}

/**
 * Plain decimal string ("1234.5", "-0.01", "1e3") to subunits
 */
export function fromDecimalString(value: string, currency: CurrencyContext, options: SubunitOptions & { infinitePrecision: true }): Decimal;
export function fromDecimalString(value: string, currency: CurrencyContext, options?: SubunitOptions & { infinitePrecision?: false }): bigint;
export function fromDecimalString(value: string, currency: CurrencyContext, options?: SubunitOptions): bigint | Decimal;
export function fromDecimalString(value: string, currency: CurrencyContext, options: SubunitOptions = {}): bigint | Decimal {
  let decimal: Decimal;
  try {
    decimal = new ExactDecimal(value.trim());
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidAmountError(`Invalid decimal amount (${reason})`, value);
  }
  if (!decimal.isFinite()) {
    throw new InvalidAmountError('Invalid decimal amount (not finite)', value);
  }
  return fromDecimal(decimal, currency, options);
}

/**
 * A finite number, read through its shortest decimal representation so 0.1 stays 0.1
 */
export function fromNumber(value: number, currency: CurrencyContext, options: SubunitOptions & { infinitePrecision: true }): Decimal;
export function fromNumber(value: number, currency: CurrencyContext, options?: SubunitOptions & { infinitePrecision?: false }): bigint;
export function fromNumber(value: number, currency: CurrencyContext, options?: SubunitOptions): bigint | Decimal;
export function fromNumber(value: number, currency: CurrencyContext, options: SubunitOptions = {}): bigint | Decimal {
  if (!Number.isFinite(value)) {
    throw new UnsupportedValueTypeError();
  }
  if (Number.isSafeInteger(value)) {
    return options.infinitePrecision ? new ExactDecimal(fromInteger(value, currency).toString()) : fromInteger(value, currency);
  }
  return fromDecimal(new ExactDecimal(String(value)), currency, options);
}

/**
 * Dispatch on the runtime type of a numeric value
 *
 * @throws UnsupportedValueTypeError for anything that is not a bigint, finite number or Decimal
 */
export function fromNumeric(value: unknown, currency: CurrencyContext, options: SubunitOptions = {}): bigint | Decimal {
  if (typeof value === 'bigint') {
    const subunits = fromInteger(value, currency);
    return options.infinitePrecision ? new ExactDecimal(subunits.toString()) : subunits;
  }
  if (typeof value === 'number') {
    return fromNumber(value, currency, options);
  }
  if (Decimal.isDecimal(value)) {
    return fromDecimal(value, currency, options);
  }
  throw new UnsupportedValueTypeError();
}
