import { buildServer } from './app.js';
import { loadServerConfig } from './config.js';

const start = async () => {
  const config = loadServerConfig();
  const fastify = await buildServer(config);

  try {
    await fastify.listen({ port: config.port, host: config.host });
    fastify.log.info(`Dev server listening on http://${config.host}:${config.port}`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

start().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
