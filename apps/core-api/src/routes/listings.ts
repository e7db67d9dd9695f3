/**
 * Core API Listing Routes
 *
 * POST   /v1/listings                      - List an item
 * GET    /v1/listings/:asset/:tokenId      - Read a listing
 * PATCH  /v1/listings/:asset/:tokenId      - Reprice a listing
 * DELETE /v1/listings/:asset/:tokenId      - Cancel a listing
 * POST   /v1/listings/:asset/:tokenId/buy  - Buy at the listed price
 */
import type { FastifyPluginAsync } from 'fastify';
import type { Marketplace } from 'ledger-core';
import { requireActor } from '../hooks/auth';
import { sendError } from '../errors';
import {
  buyItemSchema,
  listingResponse,
  listItemSchema,
  settlementResponse,
  tokenParamsSchema,
  updateListingSchema,
} from '../schemas';

export interface MarketplaceRouteOptions {
  marketplace: Marketplace;
}

export const listingRoutes: FastifyPluginAsync<MarketplaceRouteOptions> = async (
  fastify,
  { marketplace }
) => {
  fastify.post('/listings', async (request, reply) => {
    try {
      const caller = requireActor(request);
      const input = listItemSchema.parse(request.body);

      await marketplace.listItem(caller, input);

      return reply.status(201).send({
        success: true,
        data: listingResponse(input.asset, input.tokenId, { price: input.price, seller: caller }),
      });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  fastify.get('/listings/:asset/:tokenId', async (request, reply) => {
    try {
      const { asset, tokenId } = tokenParamsSchema.parse(request.params);
      const listing = await marketplace.getListing(asset, tokenId);

      return reply.send({ success: true, data: listingResponse(asset, tokenId, listing) });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  fastify.patch('/listings/:asset/:tokenId', async (request, reply) => {
    try {
      const caller = requireActor(request);
      const key = tokenParamsSchema.parse(request.params);
      const { newPrice } = updateListingSchema.parse(request.body);

      await marketplace.updateListing(caller, { ...key, newPrice });

      return reply.send({
        success: true,
        data: listingResponse(key.asset, key.tokenId, { price: newPrice, seller: caller }),
      });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  fastify.delete('/listings/:asset/:tokenId', async (request, reply) => {
    try {
      const caller = requireActor(request);
      const key = tokenParamsSchema.parse(request.params);

      await marketplace.cancelListing(caller, key);

      return reply.send({ success: true });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  fastify.post('/listings/:asset/:tokenId/buy', async (request, reply) => {
    try {
      const caller = requireActor(request);
      const key = tokenParamsSchema.parse(request.params);
      const terms = buyItemSchema.parse(request.body);

      const record = await marketplace.buyItem(caller, { ...key, ...terms });

      return reply.send({ success: true, data: settlementResponse(record) });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });
};
