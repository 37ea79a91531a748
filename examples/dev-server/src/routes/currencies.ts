/**
 * Currency lookup route
 * GET /api/currencies/:code
 */

import type { FastifyInstance } from 'fastify';
import { UnknownCurrencyError, type MoneyParser } from '@amountkit/core';
import { ERROR_RESPONSE_SCHEMA, sendError } from './errors.js';

export function registerCurrencyRoutes(fastify: FastifyInstance, parser: MoneyParser) {
  fastify.get<{ Params: { code: string } }>('/api/currencies/:code', {
    schema: {
      description: 'Currency conventions used by the parser',
      tags: ['Currencies'],
      params: {
        type: 'object',
        required: ['code'],
        properties: {
          code: { type: 'string', description: 'ISO 4217 code (case-insensitive)' },
        },
      },
      response: {
        200: {
          type: 'object',
          properties: {
            code: { type: 'string' },
            decimalMark: { type: 'string' },
            thousandsSeparator: { type: 'string' },
            subunitToUnit: { type: 'integer' },
            decimalPlaces: { type: 'integer' },
          },
        },
        404: ERROR_RESPONSE_SCHEMA,
        500: ERROR_RESPONSE_SCHEMA,
      },
    },
  }, async (request, reply) => {
    try {
      return reply.status(200).send(parser.currencyFor(request.params.code));
    } catch (error) {
      if (error instanceof UnknownCurrencyError) {
        return reply.status(404).send({ message: error.message, category: 'UnknownCurrency' });
      }
      return sendError(reply, error);
    }
  });
}
