/**
 * CurrencyContext
 * The per-currency conventions the parser needs
 */
export interface CurrencyContext {
  /** Canonical ISO 4217 code (e.g., "USD", "BRL") */
  readonly code: string;

  /** Character separating whole units from the fraction (e.g., "." for USD, "," for EUR) */
  readonly decimalMark: string;

  /** Character used for digit grouping; informational, the parser infers grouping from the text */
  readonly thousandsSeparator?: string;

  /** Subunits per whole unit (100 for USD, 1 for JPY, 1000 for KWD) */
  readonly subunitToUnit: number;

  /** Number of fractional digits kept when rounding */
  readonly decimalPlaces: number;
}

/**
 * CurrencyRegistry
 * Source of currency metadata, injected into the parser
 */
export interface CurrencyRegistry {
  /**
   * Look up a currency by code (case-insensitive)
   * Returns null when the code is unknown
   */
  lookup(code: string): CurrencyContext | null;

  /**
   * Code used when neither the text nor the caller names a currency
   */
  defaultCurrency(): string;
}
