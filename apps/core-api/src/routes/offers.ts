/**
 * Core API Offer Routes
 *
 * POST   /v1/offers                              - Stake an offer
 * GET    /v1/offers/:asset/:tokenId/:offerer     - Read an offer
 * DELETE /v1/offers/:asset/:tokenId              - Withdraw the caller's offer
 * POST   /v1/offers/:asset/:tokenId/accept       - Owner accepts an offer
 */
import type { FastifyPluginAsync } from 'fastify';
import { requireActor } from '../hooks/auth';
import { sendError } from '../errors';
import {
  acceptOfferSchema,
  makeOfferSchema,
  offerParamsSchema,
  settlementResponse,
  tokenParamsSchema,
} from '../schemas';
import type { MarketplaceRouteOptions } from './listings';

export const offerRoutes: FastifyPluginAsync<MarketplaceRouteOptions> = async (
  fastify,
  { marketplace }
) => {
  fastify.post('/offers', async (request, reply) => {
    try {
      const caller = requireActor(request);
      const input = makeOfferSchema.parse(request.body);

      await marketplace.makeOffer(caller, input);

      return reply.status(201).send({
        success: true,
        data: {
          asset: input.asset,
          tokenId: input.tokenId.toString(),
          offerer: caller,
          amount: input.offerPrice.toString(),
        },
      });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  fastify.get('/offers/:asset/:tokenId/:offerer', async (request, reply) => {
    try {
      const { asset, tokenId, offerer } = offerParamsSchema.parse(request.params);
      const amount = await marketplace.getOffer(asset, tokenId, offerer);

      return reply.send({
        success: true,
        data: { asset, tokenId: tokenId.toString(), offerer, amount: amount.toString() },
      });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  fastify.delete('/offers/:asset/:tokenId', async (request, reply) => {
    try {
      const caller = requireActor(request);
      const key = tokenParamsSchema.parse(request.params);

      await marketplace.cancelOffer(caller, key);

      return reply.send({ success: true });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  fastify.post('/offers/:asset/:tokenId/accept', async (request, reply) => {
    try {
      const caller = requireActor(request);
      const key = tokenParamsSchema.parse(request.params);
      const terms = acceptOfferSchema.parse(request.body);

      const record = await marketplace.acceptOffer(caller, { ...key, ...terms });

      return reply.send({ success: true, data: settlementResponse(record) });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });
};
