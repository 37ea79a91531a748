import { z } from 'zod';
import { ValidationError } from './errors/index.js';
import type { ParseOptions } from './interfaces/index.js';

/**
 * Zod schemas for runtime validation of parser options
 */

/**
 * Currency code as passed by callers (case is normalised by the registry)
 */
const CurrencyCodeSchema = z.string().trim().min(1, 'Currency code must not be empty');

/**
 * Per-call parse options
 */
export const ParseOptionsSchema = z.object({
  currency: CurrencyCodeSchema.optional(),
  assumeFromSymbol: z.boolean().optional(),
  infinitePrecision: z.boolean().optional(),
}).strict();

/**
 * Convert a ZodError into a ValidationError listing each issue
 */
export function toValidationError(message: string, error: z.ZodError): ValidationError {
  return new ValidationError(message, {
    issues: error.issues.map((issue) => ({
      path: issue.path.map(String).join('.'),
      message: issue.message,
    })),
  });
}

/**
 * Validate parse options
 * Returns the parsed options or throws ValidationError
 */
export function validateParseOptions(options: unknown): ParseOptions {
  const result = ParseOptionsSchema.safeParse(options ?? {});
  if (!result.success) {
    throw toValidationError('Invalid parse options', result.error);
  }
  return result.data;
}

/**
 * Helper to safely validate without throwing
 * Returns { success: true, data } or { success: false, error }
 */
export function safeValidateParseOptions(options: unknown) {
  return ParseOptionsSchema.safeParse(options ?? {});
}
