import type { FastifyInstance } from 'fastify';

export function registerHealthRoute(fastify: FastifyInstance) {
  fastify.get('/health', {
    schema: {
      description: 'Health check',
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            ts: { type: 'string' },
          },
        },
      },
    },
  }, async () => ({ status: 'ok', ts: new Date().toISOString() }));
}
