/**
 * Logging Utilities - Safe value serialization for logging
 */

import { MoneyParseError } from '../errors/index.js';

/**
 * Safely serialize values for logging
 * Bigints become strings; circular structures are replaced by a marker string.
 */
export function serializeForLog(obj: unknown): unknown {
  if (typeof obj === 'bigint') return obj.toString();
  try {
    if (obj === null || obj === undefined) return obj;
    if (typeof obj !== 'object') return obj;
    return JSON.parse(
      JSON.stringify(obj, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value))
    );
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : 'unknown error';
    return `[Unserializable object: ${errorMsg}]`;
  }
}

/**
 * Truncate a string to a maximum length
 * If the string exceeds maxLength, appends "..." to indicate truncation.
 */
export function truncateString(str: string, maxLength: number = 120): string {
  if (str.length <= maxLength) return str;
  return str.substring(0, maxLength) + '...';
}

/**
 * Create a safe log object from an error
 * Parse errors also carry their category and offending input.
 */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof MoneyParseError) {
    return {
      type: error.name,
      category: error.category,
      message: error.message,
      input: error.input === undefined ? undefined : truncateString(error.input),
    };
  }

  if (error instanceof Error) {
    return {
      type: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  if (typeof error === 'object' && error !== null) {
    const serialized = serializeForLog(error);
    return typeof serialized === 'object' && serialized !== null
      ? { ...serialized }
      : { type: 'object', message: String(serialized) };
  }

  return {
    type: typeof error,
    message: String(error),
  };
}
