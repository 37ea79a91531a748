import type { FastifyBaseLogger } from 'fastify';
import type { Logger } from '@amountkit/core';

/**
 * Wrap Fastify's Pino logger to match the parser's Logger interface
 *
 * Pino takes (obj, msg) while the parser calls (message, meta).
 * This wrapper converts between the two.
 */
export function wrapPinoLogger(pinoLogger: FastifyBaseLogger): Logger {
  return {
    debug: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.debug({ msg: message, ...meta });
    },
    info: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.info({ msg: message, ...meta });
    },
    warn: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.warn({ msg: message, ...meta });
    },
    error: (message: string, meta?: Record<string, unknown>) => {
      pinoLogger.error({ msg: message, ...meta });
    },
  };
}
