import type { LedgerConfig } from './config/env';
import { PgExecutionHost } from './db/pgHost';
import { Marketplace } from './marketplace';
import { InMemoryExecutionHost } from './memory/inMemoryHost';
import { NaclSignatureOracle } from './settlement/authorization';
import { logger } from './utils/logger';

export interface MarketplaceRuntime {
  marketplace: Marketplace;
  // Present only on the memory backend, where the dev routes mint and fund
  memory: InMemoryExecutionHost | null;
}

export function createMarketplaceRuntime(config: LedgerConfig): MarketplaceRuntime {
  const signatures = new NaclSignatureOracle();

  if (config.backend === 'postgres') {
    const host = new PgExecutionHost({
      custodian: config.custodian,
      defaultFeeBps: config.marketplaceFeeBps,
    });
    logger.info('Marketplace ledger on PostgreSQL', { custodian: config.custodian });
    return {
      marketplace: new Marketplace({ host, signatures, operator: config.operator, custodian: config.custodian }),
      memory: null,
    };
  }

  const memory = new InMemoryExecutionHost({
    custodian: config.custodian,
    marketplaceFeeBps: config.marketplaceFeeBps,
  });
  logger.info('Marketplace ledger in memory', { custodian: config.custodian });
  return {
    marketplace: new Marketplace({ host: memory, signatures, operator: config.operator, custodian: config.custodian }),
    memory,
  };
}
