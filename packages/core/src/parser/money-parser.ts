import type { Decimal } from 'decimal.js';
import type { CurrencyContext, CurrencyRegistry, ParseOptions } from '../interfaces/index.js';
import type { Logger } from '../interfaces/logger.js';
import type { Money } from '../types/index.js';
import { errorToLog } from '../utils/logging.js';
import { validateParseOptions } from '../validation.js';
import { fromDecimalString, fromNumeric } from './numeric.js';
import { parseMoney, requireCurrency } from './parse.js';

export interface MoneyParserConfig {
  registry: CurrencyRegistry;
  logger?: Logger;
  /** Options applied to every call unless overridden per call */
  defaults?: ParseOptions;
}

/**
 * MoneyParser
 * Parser bound to a registry, a logger and default options
 */
export interface MoneyParser {
  parse(input: string, options: ParseOptions & { infinitePrecision: true }): Money<Decimal>;
  parse(input: string, options?: ParseOptions & { infinitePrecision?: false }): Money<bigint>;
  parse(input: string, options?: ParseOptions): Money<bigint | Decimal>;

  /** Convert a bigint, number or Decimal in whole units */
  fromNumeric(value: unknown, options?: ParseOptions): Money<bigint | Decimal>;

  /** Convert a plain decimal string ("1234.5") in whole units */
  fromDecimalString(value: string, options?: ParseOptions): Money<bigint | Decimal>;

  /** Currency metadata for a code, or the configured default */
  currencyFor(code?: string): CurrencyContext;
}

/**
 * Create a MoneyParser
 *
 * Usage:
 * ```typescript
 * const parser = createMoneyParser({
 *   registry: createCurrencyRegistry({ defaultCurrency: 'USD' }),
 *   defaults: { assumeFromSymbol: true },
 * });
 *
 * parser.parse('R$ 1.234,56'); // { subunits: 123456n, currency: 'BRL' }
 * ```
 */
export function createMoneyParser(config: MoneyParserConfig): MoneyParser {
  const { registry, logger } = config;
  const defaults = validateParseOptions(config.defaults);

  function merge(options?: ParseOptions): ParseOptions {
    const overrides = validateParseOptions(options);
    return {
      currency: overrides.currency ?? defaults.currency,
      assumeFromSymbol: overrides.assumeFromSymbol ?? defaults.assumeFromSymbol,
      infinitePrecision: overrides.infinitePrecision ?? defaults.infinitePrecision,
    };
  }

  function currencyFor(code?: string): CurrencyContext {
    return requireCurrency(registry, code ?? defaults.currency ?? registry.defaultCurrency());
  }

  function convert(
    kind: string,
    options: ParseOptions | undefined,
    run: (currency: CurrencyContext, opts: ParseOptions) => bigint | Decimal
  ): Money<bigint | Decimal> {
    try {
      const opts = merge(options);
      const currency = currencyFor(opts.currency);
      const subunits = run(currency, opts);
      logger?.debug(`Converted ${kind}`, { currency: currency.code, subunits: subunits.toString() });
      return { subunits, currency: currency.code };
    } catch (error) {
      logger?.warn(`Failed to convert ${kind}`, { error: errorToLog(error) });
      throw error;
    }
  }

  function parse(input: string, options: ParseOptions & { infinitePrecision: true }): Money<Decimal>;
  function parse(input: string, options?: ParseOptions & { infinitePrecision?: false }): Money<bigint>;
  function parse(input: string, options?: ParseOptions): Money<bigint | Decimal>;
  function parse(input: string, options?: ParseOptions): Money<bigint | Decimal> {
    return parseMoney(input, { registry, logger }, merge(options));
  }

  return {
    parse,
    fromNumeric(value: unknown, options?: ParseOptions) {
      return convert('numeric value', options, (currency, opts) =>
        fromNumeric(value, currency, { infinitePrecision: opts.infinitePrecision })
      );
    },
    fromDecimalString(value: string, options?: ParseOptions) {
      return convert('decimal string', options, (currency, opts) =>
        fromDecimalString(value, currency, { infinitePrecision: opts.infinitePrecision })
      );
    },
    currencyFor,
  };
}
