import { z } from 'zod';
import { toValidationError } from '@amountkit/core';

/**
 * Zod schemas for runtime validation of currency tables
 */

/**
 * ISO 4217-shaped code (three uppercase letters)
 */
const CurrencyCodeSchema = z.string().regex(/^[A-Z]{3}$/, 'Currency code must be three uppercase letters');

/**
 * One currency entry
 * decimalPlaces is optional and derived from subunitToUnit when absent
 */
export const CurrencyDefinitionSchema = z.object({
  code: CurrencyCodeSchema,
  name: z.string().min(1, 'Currency name is required'),
  symbol: z.string().min(1).optional(),
  decimalMark: z.string().length(1, 'Decimal mark must be a single character'),
  thousandsSeparator: z.string().length(1, 'Thousands separator must be a single character'),
  subunitToUnit: z.number().int().min(1),
  decimalPlaces: z.number().int().min(0).optional(),
}).strict().refine(
  (currency) => currency.decimalMark !== currency.thousandsSeparator,
  { message: 'Decimal mark and thousands separator must differ', path: ['thousandsSeparator'] }
);

/**
 * Whole table; codes must be unique
 */
export const CurrencyTableSchema = z.array(CurrencyDefinitionSchema).superRefine((table, ctx) => {
  const seen = new Set<string>();
  table.forEach((currency, index) => {
    if (seen.has(currency.code)) {
      ctx.addIssue({
        code: 'custom',
        message: `Duplicate currency code '${currency.code}'`,
        path: [index, 'code'],
      });
    }
    seen.add(currency.code);
  });
});

/**
 * Exported types inferred from Zod schemas
 */
export type CurrencyDefinition = z.infer<typeof CurrencyDefinitionSchema>;
export type CurrencyTable = z.infer<typeof CurrencyTableSchema>;

/**
 * Validate a currency table
 * Returns the parsed table or throws ValidationError
 */
export function validateCurrencyTable(table: unknown): CurrencyTable {
  const result = CurrencyTableSchema.safeParse(table);
  if (!result.success) {
    throw toValidationError('Invalid currency table', result.error);
  }
  return result.data;
}

/**
 * Helper to safely validate without throwing
 * Returns { success: true, data } or { success: false, error }
 */
export function safeValidateCurrencyTable(table: unknown) {
  return CurrencyTableSchema.safeParse(table);
}
