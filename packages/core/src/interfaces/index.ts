export type { Logger } from './logger.js';
export type { CurrencyContext, CurrencyRegistry } from './currency-registry.js';
export type { ParseOptions, ParseContext } from './parse-context.js';
