/**
 * Error category of a failed parse
 *
 * - "InvalidAmount": the text does not fit the amount grammar
 * - "UnsupportedValueType": a numeric entry point received a non-numeric value
 * - "UnknownCurrency": the resolved currency is missing from the registry
 */
export type MoneyParseErrorCategory = "InvalidAmount" | "UnsupportedValueType" | "UnknownCurrency";

/**
 * MoneyParseError
 * Structured error type thrown by the parser
 * Parsing is deterministic, so callers should surface these rather than retry
 */
export class MoneyParseError extends Error {
  readonly category: MoneyParseErrorCategory;

  /**
   * The input that failed, when there was one
   */
  readonly input?: string;

  constructor(
    message: string,
    category: MoneyParseErrorCategory,
    opts?: {
      input?: string;
    }
  ) {
    super(message);
    Object.setPrototypeOf(this, MoneyParseError.prototype);
    this.name = "MoneyParseError";
    this.category = category;
    this.input = opts?.input;
  }

  isRetryable(): boolean {
    return false;
  }
}

/**
 * InvalidAmountError
 * Thrown when the text cannot be read as an amount
 */
export class InvalidAmountError extends MoneyParseError {
  constructor(message: string, input?: string) {
    super(message, "InvalidAmount", { input });
    Object.setPrototypeOf(this, InvalidAmountError.prototype);
    this.name = "InvalidAmountError";
  }
}

/**
 * UnsupportedValueTypeError
 * Thrown by the numeric entry points for values that are not numbers
 */
export class UnsupportedValueTypeError extends MoneyParseError {
  constructor(message: string = "'value' should be a type of Numeric") {
    super(message, "UnsupportedValueType");
    Object.setPrototypeOf(this, UnsupportedValueTypeError.prototype);
    this.name = "UnsupportedValueTypeError";
  }
}

/**
 * UnknownCurrencyError
 * Thrown when a currency code has no registry entry
 */
export class UnknownCurrencyError extends MoneyParseError {
  constructor(readonly code: string) {
    super(`Unknown currency '${code}'`, "UnknownCurrency");
    Object.setPrototypeOf(this, UnknownCurrencyError.prototype);
    this.name = "UnknownCurrencyError";
  }
}

/**
 * ValidationError
 * Thrown when options, configuration or currency data fail validation
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    Object.setPrototypeOf(this, ValidationError.prototype);
    this.name = "ValidationError";
  }
}
