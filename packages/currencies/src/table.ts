import { readFileSync } from 'node:fs';
import { ValidationError } from '@amountkit/core';
import { validateCurrencyTable, type CurrencyTable } from './validation.js';

const DEFAULT_TABLE_URL = new URL('../data/currencies.json', import.meta.url);

let bundledTable: CurrencyTable | undefined;

/**
 * Read and validate a currency table from a JSON file
 */
export function loadCurrencyTable(source: URL | string = DEFAULT_TABLE_URL): CurrencyTable {
  const text = readFileSync(source, 'utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ValidationError('Currency table is not valid JSON', {
      source: String(source),
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  return validateCurrencyTable(raw);
}

/**
 * The table shipped with this package, read once
 */
export function bundledCurrencies(): CurrencyTable {
  bundledTable ??= loadCurrencyTable();
  return bundledTable;
}
