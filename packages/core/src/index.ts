// Domain types
export * from './types/index.js';

// Interfaces and contracts
export * from './interfaces/index.js';

// Errors
export {
  MoneyParseError,
  InvalidAmountError,
  UnsupportedValueTypeError,
  UnknownCurrencyError,
  ValidationError,
} from './errors/index.js';
export type { MoneyParseErrorCategory } from './errors/index.js';

// Parsing
export * from './parser/index.js';

// Validation
export {
  ParseOptionsSchema,
  validateParseOptions,
  safeValidateParseOptions,
  toValidationError,
} from './validation.js';

// Utilities
export { serializeForLog, truncateString, errorToLog } from './utils/index.js';
