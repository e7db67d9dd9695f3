// Load env FIRST, before any config is parsed
import './loadEnv';

import {
  applySchema,
  closePool,
  createMarketplaceRuntime,
  loadLedgerConfig,
  logger,
} from 'ledger-core';
import { loadApiConfig } from './config';
import { buildServer } from './server';
import { EventBroadcaster } from './ws/broadcast';

async function main(): Promise<void> {
  const ledgerConfig = loadLedgerConfig();
  const apiConfig = loadApiConfig();

  if (ledgerConfig.backend === 'postgres') {
    await applySchema();
  }

  const runtime = createMarketplaceRuntime(ledgerConfig);
  const fastify = await buildServer({ runtime, apiConfig });
  const broadcaster = new EventBroadcaster(runtime.marketplace.events);

  await fastify.listen({ port: apiConfig.port, host: apiConfig.host });
  broadcaster.attach(fastify.server);
  logger.info('Core API running', {
    url: `http://${apiConfig.host}:${apiConfig.port}`,
    backend: ledgerConfig.backend,
    operator: ledgerConfig.operator,
  });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info('Shutting down', { signal });
    broadcaster.close();
    await fastify.close();
    if (ledgerConfig.backend === 'postgres') {
      await closePool();
    }
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error('Shutdown failed', { signal }, err instanceof Error ? err : new Error(String(err)));
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  logger.error('Core API failed to start', {}, err instanceof Error ? err : new Error(String(err)));
  process.exit(1);
});
