import type { FastifyPluginAsync } from 'fastify';
import { requireActor } from '../hooks/auth';
import { sendError } from '../errors';
import { marketplaceFeeSchema } from '../schemas';
import type { MarketplaceRouteOptions } from './listings';

export const marketplaceRoutes: FastifyPluginAsync<MarketplaceRouteOptions> = async (
  fastify,
  { marketplace }
) => {
  // GET /v1/marketplace/fee
  fastify.get('/marketplace/fee', async (request, reply) => {
    try {
      const feeBps = await marketplace.getMarketplaceFee();
      return reply.send({
        success: true,
        data: {
          feeBps,
          operator: marketplace.getOperator(),
          custodian: marketplace.getCustodian(),
        },
      });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  // PUT /v1/marketplace/fee - operator only
  fastify.put('/marketplace/fee', async (request, reply) => {
    try {
      const caller = requireActor(request);
      const { feeBps } = marketplaceFeeSchema.parse(request.body);

      await marketplace.setMarketplaceFee(caller, feeBps);

      return reply.send({ success: true, data: { feeBps } });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });
};
