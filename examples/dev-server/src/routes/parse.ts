/**
 * Parse routes
 * POST /api/parse    free-form text → subunits
 * POST /api/convert  number or decimal string → subunits
 */

import type { FastifyInstance } from 'fastify';
import type { MoneyParser } from '@amountkit/core';
import { ERROR_RESPONSE_SCHEMA, sendError } from './errors.js';

interface ParseBody {
  input: string;
  currency?: string;
  assumeFromSymbol?: boolean;
  infinitePrecision?: boolean;
}

interface ConvertBody {
  value: number | string;
  currency?: string;
  infinitePrecision?: boolean;
}

const MONEY_RESPONSE_SCHEMA = {
  type: 'object',
  properties: {
    subunits: { type: 'string', description: 'Signed amount in the smallest currency unit' },
    currency: { type: 'string', description: 'ISO 4217 code' },
    exact: { type: 'boolean', description: 'True when computed with infinite precision' },
  },
} as const;

export function registerParseRoutes(fastify: FastifyInstance, parser: MoneyParser) {
  fastify.post<{ Body: ParseBody }>('/api/parse', {
    schema: {
      description: 'Parse a free-form monetary amount',
      tags: ['Parse'],
      summary: 'Parse amount text',
      body: {
        type: 'object',
        required: ['input'],
        properties: {
          input: { type: 'string', description: 'Amount text, e.g. "R$ 1.234,56" or "1.5M"' },
          currency: { type: 'string', description: 'Currency used when the text names none' },
          assumeFromSymbol: { type: 'boolean', description: 'Infer the currency from a leading symbol' },
          infinitePrecision: { type: 'boolean', description: 'Keep fractional subunits' },
        },
        examples: [
          { input: '$1,234.56' },
          { input: 'R$ 1.234,56', assumeFromSymbol: true },
          { input: '1.5M', currency: 'EUR' },
        ],
      },
      response: {
        200: MONEY_RESPONSE_SCHEMA,
        400: ERROR_RESPONSE_SCHEMA,
        500: ERROR_RESPONSE_SCHEMA,
      },
    },
  }, async (request, reply) => {
    const { input, ...options } = request.body;

    try {
      const money = parser.parse(input, options);
      return reply.status(200).send({
        subunits: money.subunits.toString(),
        currency: money.currency,
        exact: typeof money.subunits !== 'bigint',
      });
    } catch (error) {
      return sendError(reply, error);
    }
  });

  fastify.post<{ Body: ConvertBody }>('/api/convert', {
    schema: {
      description: 'Convert a number or plain decimal string in whole units',
      tags: ['Parse'],
      summary: 'Convert numeric amount',
      body: {
        type: 'object',
        required: ['value'],
        properties: {
          value: { type: ['number', 'string'], description: 'Whole-unit amount, e.g. 12.5 or "1234.5"' },
          currency: { type: 'string' },
          infinitePrecision: { type: 'boolean' },
        },
      },
      response: {
        200: MONEY_RESPONSE_SCHEMA,
        400: ERROR_RESPONSE_SCHEMA,
        500: ERROR_RESPONSE_SCHEMA,
      },
    },
  }, async (request, reply) => {
    const { value, ...options } = request.body;

    try {
      const money = typeof value === 'string'
        ? parser.fromDecimalString(value, options)
        : parser.fromNumeric(value, options);
      return reply.status(200).send({
        subunits: money.subunits.toString(),
        currency: money.currency,
        exact: typeof money.subunits !== 'bigint',
      });
    } catch (error) {
      return sendError(reply, error);
    }
  });
}
