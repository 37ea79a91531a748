/**
 * Subunit computation
 *
 * Turns digit strings into a signed count of the currency's smallest unit.
 */

import type { Decimal } from 'decimal.js';
import type { CurrencyContext } from '../interfaces/index.js';
import type { ParsedAmount } from '../types/index.js';
import { ExactDecimal } from './exact-decimal.js';

export interface SubunitOptions {
  /** Keep the fraction as an exact Decimal instead of rounding (default: false) */
  infinitePrecision?: boolean;
}

function toBigInt(digits: string): bigint {
  return digits.length === 0 ? 0n : BigInt(digits);
}

/**
 * Round fractional digits to the currency's decimal places
 *
 * Shorter fractions are right-padded. Longer ones round half-up on the first
 * dropped digit only.
 */
export function roundMinorDigits(minor: string, decimalPlaces: number): bigint {
  if (minor.length < decimalPlaces) {
    return toBigInt(minor.padEnd(decimalPlaces, '0'));
  }

  if (minor.length > decimalPlaces) {
    const kept = toBigInt(minor.slice(0, decimalPlaces));
    return Number(minor[decimalPlaces]) >= 5 ? kept + 1n : kept;
  }

  return toBigInt(minor);
}

/**
 * Combine digit strings, multiplier and currency metadata into subunits
 *
 * Fraction digits shifted into the whole part by a K/M/B/T multiplier count as
 * hundredths, whatever the currency's subunit ratio.
 */
export function computeSubunits(
  amount: ParsedAmount,
  currency: CurrencyContext,
  options: SubunitOptions & { infinitePrecision: true }
): Decimal;
export function computeSubunits(
  amount: ParsedAmount,
  currency: CurrencyContext,
  options?: SubunitOptions & { infinitePrecision?: false }
): bigint;
export function computeSubunits(
  amount: ParsedAmount,
  currency: CurrencyContext,
  options?: SubunitOptions
): bigint | Decimal;
export function computeSubunits(
  amount: ParsedAmount,
  currency: CurrencyContext,
  options: SubunitOptions = {}
): bigint | Decimal {
  const exponent = amount.multiplierExponent;
  const subunitToUnit = BigInt(currency.subunitToUnit);

  let subunits = toBigInt(amount.major) * subunitToUnit;
  subunits *= 10n ** BigInt(exponent);

  const minor = amount.minor + '0'.repeat(exponent);
  subunits += toBigInt(minor.slice(0, exponent)) * 100n;

  const fraction = minor.slice(exponent);

  if (options.infinitePrecision) {
    const exact = new ExactDecimal(subunits.toString()).plus(
      fraction.length === 0 ? 0 : new ExactDecimal(`0.${fraction}`).times(currency.subunitToUnit)
    );
    return amount.negative && !exact.isZero() ? exact.neg() : exact;
  }

  subunits += roundMinorDigits(fraction, currency.decimalPlaces);
  return amount.negative ? -subunits : subunits;
}
