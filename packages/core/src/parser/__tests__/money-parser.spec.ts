import { describe, it, expect, beforeEach, vi } from 'vitest';
import { UnknownCurrencyError, UnsupportedValueTypeError, ValidationError } from '../../errors/index.js';
import type { Logger } from '../../interfaces/index.js';
import { createMoneyParser } from '../money-parser.js';
import { createTestRegistry } from './fixtures.js';

describe('createMoneyParser', () => {
  let logger: Logger;

  beforeEach(() => {
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
  });

  it('applies default options to every call', () => {
    const parser = createMoneyParser({ registry: createTestRegistry(), defaults: { assumeFromSymbol: true } });
    expect(parser.parse('£5')).toEqual({ subunits: 500n, currency: 'GBP' });
  });

  it('lets per-call options override the defaults', () => {
    const parser = createMoneyParser({ registry: createTestRegistry(), defaults: { assumeFromSymbol: true } });
    expect(parser.parse('£5', { assumeFromSymbol: false })).toEqual({ subunits: 500n, currency: 'USD' });
  });

  it('uses the default currency from its options', () => {
    const parser = createMoneyParser({ registry: createTestRegistry(), defaults: { currency: 'EUR' } });
    expect(parser.parse('10')).toEqual({ subunits: 1000n, currency: 'EUR' });
    expect(parser.currencyFor().code).toBe('EUR');
    expect(parser.currencyFor('jpy').code).toBe('JPY');
  });

  it('parses with infinite precision when asked', () => {
    const parser = createMoneyParser({ registry: createTestRegistry() });
    expect(parser.parse('0.125', { infinitePrecision: true }).subunits.toString()).toBe('12.5');
  });

  it('converts numeric values', () => {
    const parser = createMoneyParser({ registry: createTestRegistry(), logger });
    expect(parser.fromNumeric(12.5)).toEqual({ subunits: 1250n, currency: 'USD' });
    expect(logger.debug).toHaveBeenCalledWith('Converted numeric value', { currency: 'USD', subunits: '1250' });
  });

  it('converts decimal strings in the requested currency', () => {
    const parser = createMoneyParser({ registry: createTestRegistry() });
    expect(parser.fromDecimalString('1.5', { currency: 'KWD' })).toEqual({ subunits: 1500n, currency: 'KWD' });
  });

  it('logs and rethrows conversion failures', () => {
    const parser = createMoneyParser({ registry: createTestRegistry(), logger });
    expect(() => parser.fromNumeric('12')).toThrow(UnsupportedValueTypeError);
    expect(logger.warn).toHaveBeenCalledWith(
      'Failed to convert numeric value',
      expect.objectContaining({ error: expect.objectContaining({ category: 'UnsupportedValueType' }) })
    );
  });

  it('throws UnknownCurrencyError for an unknown currency', () => {
    const parser = createMoneyParser({ registry: createTestRegistry() });
    expect(() => parser.currencyFor('XYZ')).toThrow(UnknownCurrencyError);
  });

  it('rejects malformed defaults', () => {
    expect(() => createMoneyParser({ registry: createTestRegistry(), defaults: { currency: '' } })).toThrow(
      ValidationError
    );
  });
});
