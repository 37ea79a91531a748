import { describe, it, expect } from 'vitest';
import { ValidationError } from '@amountkit/core';
import { bundledCurrencies, loadCurrencyTable } from '../table.js';

describe('loadCurrencyTable', () => {
  it('reads a table from a JSON file', () => {
    const table = loadCurrencyTable(new URL('./fixtures/small-table.json', import.meta.url));
    expect(table.map((currency) => currency.code)).toEqual(['ABC', 'XYZ']);
    expect(table[1]?.symbol).toBe('¤');
  });

  it('throws ValidationError for invalid JSON', () => {
    expect(() => loadCurrencyTable(new URL('./fixtures/broken.json', import.meta.url))).toThrow(ValidationError);
    expect(() => loadCurrencyTable(new URL('./fixtures/broken.json', import.meta.url))).toThrow(
      'Currency table is not valid JSON'
    );
  });
});

describe('bundledCurrencies', () => {
  it('ships forty currencies with unique codes', () => {
    const codes = bundledCurrencies().map((currency) => currency.code);
    expect(codes).toHaveLength(40);
    expect(new Set(codes).size).toBe(40);
  });

  it('returns the same table on every call', () => {
    expect(bundledCurrencies()).toBe(bundledCurrencies());
  });
});
