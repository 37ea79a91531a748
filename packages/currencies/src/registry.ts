import { UnknownCurrencyError, type CurrencyContext, type CurrencyRegistry } from '@amountkit/core';
import { bundledCurrencies } from './table.js';
import { validateCurrencyTable, type CurrencyDefinition } from './validation.js';

export interface CurrencyRegistryOptions {
  /** Code returned by defaultCurrency() (default: "USD") */
  defaultCurrency?: string;

  /**
   * Currency entries to serve
   * Default: the bundled table
   */
  currencies?: CurrencyDefinition[];
}

/**
 * Decimal places implied by a subunit ratio: ceil(log10(subunitToUnit))
 * 100 → 2, 1 → 0, 5 → 1
 */
export function decimalPlacesFor(subunitToUnit: number): number {
  let places = 0;
  for (let scale = 1; scale < subunitToUnit; scale *= 10) {
    places += 1;
  }
  return places;
}

function toContext(currency: CurrencyDefinition): CurrencyContext {
  return Object.freeze({
    code: currency.code,
    decimalMark: currency.decimalMark,
    thousandsSeparator: currency.thousandsSeparator,
    subunitToUnit: currency.subunitToUnit,
    decimalPlaces: currency.decimalPlaces ?? decimalPlacesFor(currency.subunitToUnit),
  });
}

/**
 * In-memory CurrencyRegistry
 *
 * Lookups are case-insensitive ("usd" finds USD).
 *
 * @throws UnknownCurrencyError when the default currency is not in the table
 * @throws ValidationError when custom entries are malformed
 */
export function createCurrencyRegistry(options: CurrencyRegistryOptions = {}): CurrencyRegistry {
  const table = options.currencies ? validateCurrencyTable(options.currencies) : bundledCurrencies();

  const byCode = new Map<string, CurrencyContext>();
  for (const currency of table) {
    byCode.set(currency.code, toContext(currency));
  }

  const defaultCode = (options.defaultCurrency ?? 'USD').trim().toUpperCase();
  if (!byCode.has(defaultCode)) {
    throw new UnknownCurrencyError(defaultCode);
  }

  return {
    lookup(code: string): CurrencyContext | null {
      return byCode.get(code.trim().toUpperCase()) ?? null;
    },
    defaultCurrency(): string {
      return defaultCode;
    },
  };
}
