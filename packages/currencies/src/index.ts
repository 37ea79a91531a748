export { createCurrencyRegistry, decimalPlacesFor } from './registry.js';
export type { CurrencyRegistryOptions } from './registry.js';
export { loadCurrencyTable, bundledCurrencies } from './table.js';
export {
  CurrencyDefinitionSchema,
  CurrencyTableSchema,
  validateCurrencyTable,
  safeValidateCurrencyTable,
} from './validation.js';
export type { CurrencyDefinition, CurrencyTable } from './validation.js';
