/**
 * Money domain types
 */

import type { Decimal } from 'decimal.js';

/**
 * A parsed monetary amount
 * `subunits` is a bigint under fixed precision and a Decimal under infinite precision
 */
export interface Money<TAmount extends bigint | Decimal = bigint> {
  /** Amount in smallest currency unit (e.g., cents for USD, fillér for HUF) */
  subunits: TAmount;

  /** ISO 4217 currency code (e.g., "USD", "HUF", "EUR") */
  currency: string;
}

/** Power of ten applied by a K/M/B/T suffix */
export type MultiplierExponent = 0 | 3 | 6 | 9 | 12;

/**
 * Amount split into digit strings, before any currency arithmetic
 */
export interface ParsedAmount {
  /** Whole-unit digits, possibly empty */
  major: string;

  /** Fractional digits, possibly empty */
  minor: string;

  negative: boolean;

  multiplierExponent: MultiplierExponent;
}
