import Fastify from 'fastify';
import cors from '@fastify/cors';
import 'dotenv/config';
import { loadConfig } from './lib/config.js';
import { registerErrorHandler } from './lib/error-handler.js';
import { closeRedisConnection, isRedisAvailable } from './lib/redis.js';
import storePlugin from './plugins/store.plugin.js';
import { matchingRoutes } from './routes/matching.js';
import { analyticsRoutes } from './routes/analytics.js';
import { allocationsRoutes } from './routes/allocations.js';
import { closeQueues } from './jobs/index.js';

const config = loadConfig();

const fastify = Fastify({
  logger: { level: config.logLevel },
});

await fastify.register(cors, {
  origin: config.frontendUrl,
  credentials: true,
});

// SQLite store (decorates fastify.store)
await fastify.register(storePlugin);

registerErrorHandler(fastify);

fastify.get('/health', async () => {
  return {
    status: 'ok',
    cache: config.cache.enabled ? await isRedisAvailable() : 'disabled',
  };
});

// Register API routes
await fastify.register(matchingRoutes);
await fastify.register(analyticsRoutes);
await fastify.register(allocationsRoutes);

fastify.addHook('onClose', async () => {
  await closeQueues();
  await closeRedisConnection();
});

const shutdown = async (signal: string) => {
  fastify.log.info(`Received ${signal}, shutting down`);
  try {
    await fastify.close();
    process.exit(0);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

await start();
