import type { FastifyPluginAsync } from 'fastify';
import type { MarketplaceRuntime } from 'ledger-core';

export interface HealthRouteOptions {
  runtime: MarketplaceRuntime;
}

export const healthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (fastify, { runtime }) => {
  fastify.get('/health', async () => {
    return {
      ok: true,
      service: 'marketplace-api',
      backend: runtime.memory ? 'memory' : 'postgres',
      timestamp: new Date().toISOString(),
    };
  });
};
