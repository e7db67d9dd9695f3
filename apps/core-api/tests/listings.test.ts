import type { FastifyInstance } from 'fastify';
import {
  actor,
  ASSET,
  authorize,
  buildTestApp,
  BUYER,
  COLLECTION_OWNER,
  seedToken,
  SELLER,
} from './helpers/app';

const PRICE = '100000000000000000';

let app: FastifyInstance;

beforeEach(async () => {
  app = await buildTestApp();
  await seedToken(app, '0', SELLER, BUYER, PRICE);
});

afterEach(async () => {
  await app.close();
});

function listToken(price: string = PRICE) {
  return app.inject({
    method: 'POST',
    url: '/v1/listings',
    headers: actor(SELLER),
    payload: { asset: ASSET, tokenId: '0', price },
  });
}

function buyToken(buyer: string = BUYER, counterparty: string = buyer) {
  return app.inject({
    method: 'POST',
    url: `/v1/listings/${ASSET}/0/buy`,
    headers: actor(buyer),
    payload: {
      paidAmount: PRICE,
      authorization: authorize(counterparty),
      collectionOwner: COLLECTION_OWNER,
      collectionFeeBps: 150,
    },
  });
}

describe('GET /health', () => {
  it('reports ok with the ledger backend', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json<unknown>()).toMatchObject({
      ok: true,
      service: 'marketplace-api',
      backend: 'memory',
    });
  });
});

describe('POST /v1/listings', () => {
  it('lists an item', async () => {
    const response = await listToken();

    expect(response.statusCode).toBe(201);
    expect(response.json<unknown>()).toEqual({
      success: true,
      data: { asset: ASSET, tokenId: '0', price: PRICE, seller: SELLER },
    });
  });

  it('requires an actor', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/listings',
      payload: { asset: ASSET, tokenId: '0', price: PRICE },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json<unknown>()).toEqual({ success: false, error: 'x-actor-id header required' });
  });

  it('rejects a malformed amount', async () => {
    const response = await listToken('-5');

    expect(response.statusCode).toBe(400);
    expect(response.json<unknown>()).toEqual({
      success: false,
      error: 'Invalid request',
      details: { price: 'Expected an unsigned decimal integer' },
    });
  });

  it('maps AlreadyListed to 409', async () => {
    await listToken();
    const response = await listToken();

    expect(response.statusCode).toBe(409);
    expect(response.json<unknown>()).toEqual({
      success: false,
      error: 'AlreadyListed(basic-nft, 0)',
      code: 'AlreadyListed',
      details: { asset: ASSET, tokenId: '0' },
    });
  });

  it('maps PriceMustBeAboveZero to 400', async () => {
    const response = await listToken('0');

    expect(response.statusCode).toBe(400);
    expect(response.json<unknown>()).toMatchObject({ code: 'PriceMustBeAboveZero' });
  });
});

describe('GET /v1/listings/:asset/:tokenId', () => {
  it('returns the not-listed sentinel', async () => {
    const response = await app.inject({ method: 'GET', url: `/v1/listings/${ASSET}/7` });

    expect(response.statusCode).toBe(200);
    expect(response.json<unknown>()).toEqual({
      success: true,
      data: { asset: ASSET, tokenId: '7', price: '0', seller: null },
    });
  });

  it('rejects a non-numeric token id', async () => {
    const response = await app.inject({ method: 'GET', url: `/v1/listings/${ASSET}/abc` });

    expect(response.statusCode).toBe(400);
  });
});

describe('PATCH and DELETE /v1/listings/:asset/:tokenId', () => {
  it('reprices a listing', async () => {
    await listToken();

    const response = await app.inject({
      method: 'PATCH',
      url: `/v1/listings/${ASSET}/0`,
      headers: actor(SELLER),
      payload: { newPrice: '5' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.json<unknown>()).toEqual({
      success: true,
      data: { asset: ASSET, tokenId: '0', price: '5', seller: SELLER },
    });
  });

  it('maps NotOwner to 403', async () => {
    await listToken();

    const response = await app.inject({
      method: 'DELETE',
      url: `/v1/listings/${ASSET}/0`,
      headers: actor(BUYER),
    });

    expect(response.statusCode).toBe(403);
    expect(response.json<unknown>()).toMatchObject({ code: 'NotOwner' });
  });

  it('cancels a listing', async () => {
    await listToken();

    const response = await app.inject({
      method: 'DELETE',
      url: `/v1/listings/${ASSET}/0`,
      headers: actor(SELLER),
    });
    const after = await app.inject({ method: 'GET', url: `/v1/listings/${ASSET}/0` });

    expect(response.statusCode).toBe(200);
    expect(after.json<unknown>()).toMatchObject({ data: { price: '0', seller: null } });
  });
});

describe('POST /v1/listings/:asset/:tokenId/buy', () => {
  it('settles a purchase three ways', async () => {
    await listToken();

    const response = await buyToken();
    const balance = await app.inject({ method: 'GET', url: `/debug/balances/${SELLER}` });

    expect(response.statusCode).toBe(200);
    expect(response.json<unknown>()).toEqual({
      success: true,
      data: {
        totalPrice: PRICE,
        marketplaceShare: '2500000000000000',
        collectionShare: '1500000000000000',
        payeeShare: '96000000000000000',
        marketplaceFeeBps: 250,
        collectionFeeBps: 150,
      },
    });
    expect(balance.json<unknown>()).toEqual({
      success: true,
      data: { account: SELLER, balance: '96000000000000000' },
    });
  });

  it('maps NotListed to 404', async () => {
    const response = await buyToken();

    expect(response.statusCode).toBe(404);
    expect(response.json<unknown>()).toEqual({
      success: false,
      error: 'NotListed(basic-nft, 0)',
      code: 'NotListed',
      details: { asset: ASSET, tokenId: '0' },
    });
  });

  it('maps a foreign authorization to 403', async () => {
    await listToken();

    const response = await buyToken(BUYER, SELLER);

    expect(response.statusCode).toBe(403);
    expect(response.json<unknown>()).toMatchObject({
      code: 'NotSignedByMarketplaceOwner',
      details: { counterparty: BUYER },
    });
  });

  it('maps InsufficientFunds to 402', async () => {
    await listToken();

    const response = await buyToken('unfunded-buyer');

    expect(response.statusCode).toBe(402);
    expect(response.json<unknown>()).toMatchObject({ code: 'InsufficientFunds' });
  });
});
