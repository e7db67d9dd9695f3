import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { MarketplaceRuntime } from 'ledger-core';
import type { ApiConfig } from './config';
import { registerAuth } from './hooks/auth';
import { debugRoutes } from './routes/debug';
import { healthRoutes } from './routes/health';
import { listingRoutes } from './routes/listings';
import { marketplaceRoutes } from './routes/marketplace';
import { offerRoutes } from './routes/offers';

export interface ServerOptions {
  runtime: MarketplaceRuntime;
  apiConfig: ApiConfig;
}

export async function buildServer({ runtime, apiConfig }: ServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: {
      level: apiConfig.logLevel,
    },
  });

  await fastify.register(cors, {
    origin: apiConfig.corsOrigin,
    credentials: true,
  });

  // Auth hook before routes
  registerAuth(fastify, apiConfig.secret);

  const { marketplace, memory } = runtime;
  await fastify.register(healthRoutes, { runtime });
  await fastify.register(listingRoutes, { prefix: '/v1', marketplace });
  await fastify.register(offerRoutes, { prefix: '/v1', marketplace });
  await fastify.register(marketplaceRoutes, { prefix: '/v1', marketplace });
  await fastify.register(debugRoutes, {
    memory,
    enabled: apiConfig.nodeEnv !== 'production',
  });

  return fastify;
}
