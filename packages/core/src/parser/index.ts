export { CURRENCY_SYMBOLS, createSymbolResolver, resolveCurrencySymbol, scanIsoCode, computeCurrency } from './symbols.js';
export type { SymbolTable } from './symbols.js';
export { extractMultiplierExponent } from './multiplier.js';
export { cleanAmountText, disambiguateDelimiters } from './delimiters.js';
export type { CleanedAmount, AmountParts } from './delimiters.js';
export { computeSubunits, roundMinorDigits } from './subunits.js';
export type { SubunitOptions } from './subunits.js';
export { ExactDecimal } from './exact-decimal.js';
export { parseMoney, extractSubunits, resolveCurrencyCode, requireCurrency } from './parse.js';
export { fromInteger, fromDecimal, fromDecimalString, fromNumber, fromNumeric } from './numeric.js';
export { createMoneyParser } from './money-parser.js';
export type { MoneyParser, MoneyParserConfig } from './money-parser.js';
