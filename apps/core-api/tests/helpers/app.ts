import type { FastifyInstance } from 'fastify';
import {
  createMarketplaceRuntime,
  identityFromPublicKey,
  keyPairFromSeed,
  loadLedgerConfig,
  signFeeAuthorization,
  type FeeAuthorization,
} from 'ledger-core';
import type { ApiConfig } from '../../src/config';
import { buildServer } from '../../src/server';

// Deterministic key; never used outside tests
export const operatorKeys = keyPairFromSeed('07'.repeat(32));
export const OPERATOR = identityFromPublicKey(operatorKeys.publicKey);
export const CUSTODIAN = 'marketplace-custody';
export const SELLER = 'seller-alice';
export const BUYER = 'buyer-bob';
export const COLLECTION_OWNER = 'collection-owner';
export const ASSET = 'basic-nft';
export const TEST_SECRET = 'test-secret';

export function authorize(counterparty: string, collectionFeeBps = 150): FeeAuthorization {
  return signFeeAuthorization(operatorKeys.secretKey, {
    collectionOwner: COLLECTION_OWNER,
    collectionFeeBps,
    counterparty,
  });
}

export function testApiConfig(overrides: Partial<ApiConfig> = {}): ApiConfig {
  return {
    nodeEnv: 'test',
    logLevel: 'error',
    port: 0,
    host: '127.0.0.1',
    corsOrigin: 'http://localhost:3000',
    ...overrides,
  };
}

export async function buildTestApp(overrides: Partial<ApiConfig> = {}): Promise<FastifyInstance> {
  const runtime = createMarketplaceRuntime(
    loadLedgerConfig({
      NODE_ENV: 'test',
      MARKETPLACE_OPERATOR: OPERATOR,
      MARKETPLACE_CUSTODIAN: CUSTODIAN,
      MARKETPLACE_FEE_BPS: '250',
    })
  );
  const app = await buildServer({ runtime, apiConfig: testApiConfig(overrides) });
  await app.ready();
  return app;
}

export function actor(id: string): Record<string, string> {
  return { 'x-actor-id': id };
}

/** Mint to `owner`, approve the custodian and fund `buyer` through the debug routes. */
export async function seedToken(
  app: FastifyInstance,
  tokenId: string,
  owner: string,
  buyer: string,
  funds: string
): Promise<void> {
  await app.inject({ method: 'POST', url: '/debug/mint', payload: { asset: ASSET, tokenId, owner } });
  await app.inject({
    method: 'POST',
    url: '/debug/approve',
    payload: { asset: ASSET, tokenId, owner, spender: CUSTODIAN },
  });
  await app.inject({ method: 'POST', url: '/debug/deposit', payload: { account: buyer, amount: funds } });
}
