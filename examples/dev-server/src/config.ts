import { z } from 'zod';
import { toValidationError } from '@amountkit/core';

/**
 * "1"/"true" and "0"/"false" environment flags
 */
const BooleanFlagSchema = z
  .enum(['1', '0', 'true', 'false'])
  .transform((value) => value === '1' || value === 'true');

/**
 * Environment variables read by the dev server
 */
const ServerEnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  DEFAULT_CURRENCY: z.string().trim().min(1).default('USD'),
  ASSUME_FROM_SYMBOL: BooleanFlagSchema.default(false),
  INFINITE_PRECISION: BooleanFlagSchema.default(false),
  ENABLE_DOCS: BooleanFlagSchema.default(true),
});

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof ServerEnvSchema>['LOG_LEVEL'];
  defaultCurrency: string;
  assumeFromSymbol: boolean;
  infinitePrecision: boolean;
  enableDocs: boolean;
}

/**
 * Build the server configuration from environment variables
 * Throws ValidationError listing every malformed variable
 */
export function loadServerConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const result = ServerEnvSchema.safeParse(env);
  if (!result.success) {
    throw toValidationError('Invalid dev server environment', result.error);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    defaultCurrency: parsed.DEFAULT_CURRENCY,
    assumeFromSymbol: parsed.ASSUME_FROM_SYMBOL,
    infinitePrecision: parsed.INFINITE_PRECISION,
    enableDocs: parsed.ENABLE_DOCS,
  };
}
