/**
 * Core API Debug Routes (development only)
 *
 * POST /debug/mint               - Mint a token in the in-memory registry
 * POST /debug/approve            - Approve a spender for a token
 * POST /debug/deposit            - Credit an account balance
 * GET  /debug/balances/:account  - Read an account balance
 *
 * Guarded: returns 404 in production or when the ledger is not in memory.
 */
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { identitySchema, type InMemoryExecutionHost } from 'ledger-core';
import { sendError } from '../errors';
import { uintSchema } from '../schemas';

export interface DebugRouteOptions {
  memory: InMemoryExecutionHost | null;
  enabled: boolean;
}

const mintSchema = z.object({
  asset: identitySchema,
  tokenId: uintSchema,
  owner: identitySchema,
});

const approveSchema = z.object({
  asset: identitySchema,
  tokenId: uintSchema,
  owner: identitySchema,
  spender: identitySchema.nullable(),
});

const depositSchema = z.object({
  account: identitySchema,
  amount: uintSchema,
});

export const debugRoutes: FastifyPluginAsync<DebugRouteOptions> = async (
  fastify,
  { memory, enabled }
) => {
  // Block outside development - return 404 to hide existence
  fastify.addHook('onRequest', async (_request, reply) => {
    if (!enabled || !memory) {
      return reply.status(404).send({ error: 'Not found' });
    }
  });

  if (!memory) return;

  fastify.post('/debug/mint', async (request, reply) => {
    try {
      const { asset, tokenId, owner } = mintSchema.parse(request.body);
      memory.mint({ asset, tokenId }, owner);
      return reply.status(201).send({ success: true, data: { asset, tokenId: tokenId.toString(), owner } });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  fastify.post('/debug/approve', async (request, reply) => {
    try {
      const { asset, tokenId, owner, spender } = approveSchema.parse(request.body);
      memory.approve(owner, { asset, tokenId }, spender);
      return reply.send({ success: true, data: { asset, tokenId: tokenId.toString(), spender } });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  fastify.post('/debug/deposit', async (request, reply) => {
    try {
      const { account, amount } = depositSchema.parse(request.body);
      memory.deposit(account, amount);
      return reply.send({
        success: true,
        data: { account, balance: memory.balanceOf(account).toString() },
      });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });

  fastify.get('/debug/balances/:account', async (request, reply) => {
    try {
      const { account } = z.object({ account: identitySchema }).parse(request.params);
      return reply.send({
        success: true,
        data: { account, balance: memory.balanceOf(account).toString() },
      });
    } catch (error) {
      return sendError(request, reply, error);
    }
  });
};
