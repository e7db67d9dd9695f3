#!/usr/bin/env tsx
/**
 * Local Seed Script
 *
 * Mints sample tokens, funds a buyer, then lists, buys and makes an offer
 * through the core API. The core API must run the memory backend outside
 * production so the /debug routes exist.
 *
 * Usage:
 *   tsx scripts/seed/local.ts
 *
 * MARKETPLACE_OPERATOR_SEED (hex or base58, 32 bytes) lets the script sign the
 * fee authorization needed for the purchase step; without it that step is
 * skipped.
 */

import { keyPairFromSeed, signFeeAuthorization } from 'ledger-core';

const CORE_API_URL = process.env.CORE_API_URL || 'http://localhost:4010';
const CORE_API_SECRET = process.env.CORE_API_SECRET || '';
const OPERATOR_SEED = process.env.MARKETPLACE_OPERATOR_SEED || '';
const CUSTODIAN = process.env.MARKETPLACE_CUSTODIAN || 'marketplace';

const ASSET = 'seed-collection';
const SELLER = 'seed-seller';
const BUYER = 'seed-buyer';
const COLLECTION_OWNER = 'seed-collection-owner';
const COLLECTION_FEE_BPS = 150;

const ETHER = 10n ** 18n;
const PRICE = ETHER / 10n;
const OFFER = (ETHER * 8n) / 100n;

// ── Helpers ──

function headers(actorId?: string): Record<string, string> {
  const h: Record<string, string> = { 'Content-Type': 'application/json' };
  if (CORE_API_SECRET) h['x-core-api-secret'] = CORE_API_SECRET;
  if (actorId) h['x-actor-id'] = actorId;
  return h;
}

async function call(method: string, path: string, body?: unknown, actorId?: string): Promise<unknown> {
  const res = await fetch(`${CORE_API_URL}${path}`, {
    method,
    headers: headers(actorId),
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  const data: unknown = await res.json().catch(() => ({}));
  if (!res.ok) throw new Error(`${method} ${path} → ${res.status}: ${JSON.stringify(data)}`);
  return data;
}

// ── Steps ──

async function mintTokens(count: number): Promise<void> {
  console.log(`[1/4] Minting ${count} tokens to ${SELLER}...`);
  for (let id = 0; id < count; id++) {
    await call('POST', '/debug/mint', { asset: ASSET, tokenId: String(id), owner: SELLER });
    await call('POST', '/debug/approve', {
      asset: ASSET,
      tokenId: String(id),
      owner: SELLER,
      spender: CUSTODIAN,
    });
  }
}

async function fundBuyer(): Promise<void> {
  console.log(`[2/4] Funding ${BUYER}...`);
  await call('POST', '/debug/deposit', { account: BUYER, amount: ETHER.toString() });
}

async function listTokens(): Promise<void> {
  console.log('[3/4] Listing tokens 0 and 1...');
  for (const id of ['0', '1']) {
    await call('POST', '/v1/listings', { asset: ASSET, tokenId: id, price: PRICE.toString() }, SELLER);
  }
}

async function tradeTokens(): Promise<void> {
  console.log('[4/4] Offering on token 2 and buying token 1...');
  await call(
    'POST',
    '/v1/offers',
    { asset: ASSET, tokenId: '2', offerPrice: OFFER.toString(), stakedAmount: OFFER.toString() },
    BUYER
  );

  if (!OPERATOR_SEED) {
    console.log('  MARKETPLACE_OPERATOR_SEED not set; skipping purchase.');
    return;
  }

  const authorization = signFeeAuthorization(keyPairFromSeed(OPERATOR_SEED).secretKey, {
    collectionOwner: COLLECTION_OWNER,
    collectionFeeBps: COLLECTION_FEE_BPS,
    counterparty: BUYER,
  });
  const result = await call(
    'POST',
    `/v1/listings/${ASSET}/1/buy`,
    {
      paidAmount: PRICE.toString(),
      authorization,
      collectionOwner: COLLECTION_OWNER,
      collectionFeeBps: COLLECTION_FEE_BPS,
    },
    BUYER
  );
  console.log(`  Bought token 1: ${JSON.stringify(result)}`);
}

// ── Main ──

async function main() {
  console.log('\n=== Local Seed ===');
  console.log(`Core API: ${CORE_API_URL}\n`);

  try {
    const h = await fetch(`${CORE_API_URL}/health`);
    if (!h.ok) throw new Error(`Core API unhealthy: ${h.status}`);
  } catch (err) {
    console.error(`Core API not reachable at ${CORE_API_URL}: ${err instanceof Error ? err.message : String(err)}`);
    console.error('Start with: npm start');
    process.exit(1);
  }

  await mintTokens(3);
  await fundBuyer();
  await listTokens();
  await tradeTokens();

  console.log('\n=== Seed Summary ===');
  console.log(`Asset:    ${ASSET} (tokens 0-2)`);
  console.log(`Listings: 2 at ${PRICE} wei`);
  console.log(`Offer:    ${OFFER} wei on token 2 from ${BUYER}`);
  console.log();
}

main().catch((err: unknown) => {
  console.error('Seed failed:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
