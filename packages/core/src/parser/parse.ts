/**
 * Amount parsing entry point
 *
 * Resolves the currency, then runs multiplier extraction, cleaning,
 * delimiter disambiguation and subunit computation in sequence.
 */

import type { Decimal } from 'decimal.js';
import { UnknownCurrencyError } from '../errors/index.js';
import type { CurrencyContext, CurrencyRegistry, ParseContext, ParseOptions } from '../interfaces/index.js';
import type { Money } from '../types/index.js';
import { errorToLog, truncateString } from '../utils/logging.js';
import { validateParseOptions } from '../validation.js';
import { cleanAmountText, disambiguateDelimiters } from './delimiters.js';
import { extractMultiplierExponent } from './multiplier.js';
import { computeSubunits, type SubunitOptions } from './subunits.js';
import { computeCurrency, scanIsoCode } from './symbols.js';

/**
 * Look up a currency or throw UnknownCurrencyError
 */
export function requireCurrency(registry: CurrencyRegistry, code: string): CurrencyContext {
  const currency = registry.lookup(code);
  if (!currency) {
    throw new UnknownCurrencyError(code);
  }
  return currency;
}

/**
 * Pick the currency code for a trimmed amount text
 *
 * With assumeFromSymbol a leading symbol wins, then an embedded ISO code;
 * without it only the ISO code is considered. The caller's currency and then
 * the registry default apply when the text names none.
 */
export function resolveCurrencyCode(
  text: string,
  registry: CurrencyRegistry,
  options: Pick<ParseOptions, 'currency' | 'assumeFromSymbol'> = {}
): string {
  const fromText = options.assumeFromSymbol ? computeCurrency(text) : scanIsoCode(text);
  return fromText ?? options.currency ?? registry.defaultCurrency();
}

export function extractSubunits(
  text: string,
  currency: CurrencyContext,
  options: SubunitOptions & { infinitePrecision: true }
): Decimal;
export function extractSubunits(
  text: string,
  currency: CurrencyContext,
  options?: SubunitOptions & { infinitePrecision?: false }
): bigint;
export function extractSubunits(
  text: string,
  currency: CurrencyContext,
  options?: SubunitOptions
): bigint | Decimal;
export function extractSubunits(
  text: string,
  currency: CurrencyContext,
  options: SubunitOptions = {}
): bigint | Decimal {
  const multiplierExponent = extractMultiplierExponent(text);
  const { digits, negative } = cleanAmountText(text);
  const { major, minor } = disambiguateDelimiters(digits, currency.decimalMark);

  return computeSubunits({ major, minor, negative, multiplierExponent }, currency, options);
}

/**
 * Parse free-form monetary text ("$1,234.56", "R$ 1.234,56", "-£12", "1.5M")
 * into a subunit count and currency code
 *
 * @throws InvalidAmountError when the text does not fit the amount grammar
 * @throws UnknownCurrencyError when the resolved currency is not in the registry
 * @throws ValidationError when options are malformed
 */
export function parseMoney(
  input: string,
  ctx: ParseContext,
  options: ParseOptions & { infinitePrecision: true }
): Money<Decimal>;
export function parseMoney(
  input: string,
  ctx: ParseContext,
  options?: ParseOptions & { infinitePrecision?: false }
): Money<bigint>;
export function parseMoney(
  input: string,
  ctx: ParseContext,
  options?: ParseOptions
): Money<bigint | Decimal>;
export function parseMoney(
  input: string,
  ctx: ParseContext,
  options: ParseOptions = {}
): Money<bigint | Decimal> {
  const text = input.trim();

  try {
    const opts = validateParseOptions(options);
    const currency = requireCurrency(ctx.registry, resolveCurrencyCode(text, ctx.registry, opts));
    const subunits = extractSubunits(text, currency, { infinitePrecision: opts.infinitePrecision });

    ctx.logger?.debug('Parsed amount', {
      input: truncateString(text),
      currency: currency.code,
      subunits: subunits.toString(),
    });

    return { subunits, currency: currency.code };
  } catch (error) {
    ctx.logger?.warn('Failed to parse amount', {
      input: truncateString(text),
      error: errorToLog(error),
    });
    throw error;
  }
}
