import Fastify, { type FastifyInstance } from 'fastify';
import FastifyCors from '@fastify/cors';
import swaggerPlugin from '@fastify/swagger';
import swaggerUiPlugin from '@fastify/swagger-ui';
import { createMoneyParser, type CurrencyRegistry } from '@amountkit/core';
import { createCurrencyRegistry } from '@amountkit/currencies';
import type { ServerConfig } from './config.js';
import { wrapPinoLogger } from './logger.js';
import { registerCurrencyRoutes } from './routes/currencies.js';
import { registerHealthRoute } from './routes/health.js';
import { registerParseRoutes } from './routes/parse.js';

/**
 * Build the dev server without listening
 * Tests drive the returned instance through inject()
 */
export async function buildServer(
  config: ServerConfig,
  registry: CurrencyRegistry = createCurrencyRegistry({ defaultCurrency: config.defaultCurrency })
): Promise<FastifyInstance> {
  const fastify = Fastify({ logger: { level: config.logLevel } });
  await fastify.register(FastifyCors, { origin: true });

  // swagger must be registered before routes so it sees their onRoute hooks
  if (config.enableDocs) {
    await fastify.register(swaggerPlugin, {
      openapi: {
        info: { title: 'amountkit dev server', description: 'Dev server for trying the amount parser', version: '0.1.0' },
      },
    });
    await fastify.register(swaggerUiPlugin, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'full',
        deepLinking: false,
      },
    });
  }

  const parser = createMoneyParser({
    registry,
    logger: wrapPinoLogger(fastify.log),
    defaults: {
      assumeFromSymbol: config.assumeFromSymbol,
      infinitePrecision: config.infinitePrecision,
    },
  });

  registerHealthRoute(fastify);
  registerParseRoutes(fastify, parser);
  registerCurrencyRoutes(fastify, parser);

  return fastify;
}
