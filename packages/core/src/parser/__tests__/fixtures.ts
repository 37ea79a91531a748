import type { CurrencyContext, CurrencyRegistry } from '../../interfaces/index.js';

const currency = (
  code: string,
  decimalMark: string,
  thousandsSeparator: string,
  subunitToUnit: number,
  decimalPlaces: number
): CurrencyContext => ({ code, decimalMark, thousandsSeparator, subunitToUnit, decimalPlaces });

export const USD = currency('USD', '.', ',', 100, 2);
export const EUR = currency('EUR', ',', '.', 100, 2);
export const BRL = currency('BRL', ',', '.', 100, 2);
export const GBP = currency('GBP', '.', ',', 100, 2);
export const ZAR = currency('ZAR', '.', ',', 100, 2);
export const JPY = currency('JPY', '.', ',', 1, 0);
export const CAD = currency('CAD', '.', ',', 100, 2);
export const CHF = currency('CHF', '.', "'", 100, 2);
export const KWD = currency('KWD', '.', ',', 1000, 3);

/**
 * In-memory registry for tests, default USD
 */
export function createTestRegistry(defaultCurrency: string = 'USD'): CurrencyRegistry {
  const byCode = new Map([USD, EUR, BRL, GBP, ZAR, JPY, CAD, CHF, KWD].map((c): [string, CurrencyContext] => [c.code, c]));
  return {
    lookup: (code) => byCode.get(code.toUpperCase()) ?? null,
    defaultCurrency: () => defaultCurrency,
  };
}
