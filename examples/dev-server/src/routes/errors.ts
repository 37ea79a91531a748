import type { FastifyReply } from 'fastify';
import { MoneyParseError, ValidationError } from '@amountkit/core';

/**
 * Error body shared by every route
 */
export const ERROR_RESPONSE_SCHEMA = {
  type: 'object',
  properties: {
    message: { type: 'string' },
    category: { type: 'string' },
  },
} as const;

/**
 * Map parser errors to HTTP responses
 * Parse and validation failures are the client's; anything else is a 500.
 */
export function sendError(reply: FastifyReply, error: unknown) {
  if (error instanceof MoneyParseError) {
    return reply.status(400).send({ message: error.message, category: error.category });
  }

  if (error instanceof ValidationError) {
    return reply.status(400).send({ message: error.message, category: 'Validation' });
  }

  reply.log.error(error);
  return reply.status(500).send({
    message: error instanceof Error ? error.message : String(error),
    category: 'Internal',
  });
}
