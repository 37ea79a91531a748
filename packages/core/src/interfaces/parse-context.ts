import type { CurrencyRegistry } from './currency-registry.js';
import type { Logger } from './logger.js';

/**
 * Per-call parsing options
 */
export interface ParseOptions {
  /**
   * Currency used when none can be read from the text
   * Falls back to the registry default
   */
  currency?: string;

  /**
   * Infer the currency from a leading symbol ("R$", "£") before scanning for an ISO code
   * Default: false
   */
  assumeFromSymbol?: boolean;

  /**
   * Keep fractional subunits as exact decimals instead of rounding
   * Default: false
   */
  infinitePrecision?: boolean;
}

/**
 * ParseContext
 * Dependencies passed to the parser
 */
export interface ParseContext {
  /** Currency metadata source (required) */
  registry: CurrencyRegistry;

  /** Optional logger instance */
  logger?: Logger;
}
