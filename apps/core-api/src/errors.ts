/**
 * Error responses
 *
 * Every route funnels failures through sendError so the body is always
 * { success: false, error, code?, details? }.
 */
import type { FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import {
  isMarketplaceError,
  logger,
  TokenRegistryError,
  type MarketplaceErrorCode,
} from 'ledger-core';

export class HttpError extends Error {
  constructor(
    readonly statusCode: number,
    message: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

const STATUS_BY_CODE: Record<MarketplaceErrorCode, number> = {
  NotListed: 404,
  NoOffered: 404,

  NotOwner: 403,
  CanNotBeOwner: 403,
  NotMarketplaceOwner: 403,
  NotSignedByMarketplaceOwner: 403,

  AlreadyListed: 409,
  AlreadyOffered: 409,
  ReentrantCall: 409,

  PriceNotMet: 402,
  OfferPriceNotMet: 402,
  InsufficientFunds: 402,

  MarketplaceProceedsTransferFailed: 502,
  CollectionOwnerProceedsTransferFailed: 502,
  SellerProceedsTransferFailed: 502,
  CancelOfferProceedsTransferFailed: 502,

  PriceMustBeAboveZero: 400,
  NotApprovedForMarketplace: 400,
  InvalidFeeBasisPoints: 400,
  CombinedFeesExceedPrice: 400,
};

export function statusForCode(code: MarketplaceErrorCode): number {
  return STATUS_BY_CODE[code];
}

function issueDetails(error: ZodError): Record<string, string> {
  const details: Record<string, string> = {};
  for (const issue of error.errors) {
    details[issue.path.join('.') || 'body'] = issue.message;
  }
  return details;
}

export function sendError(request: FastifyRequest, reply: FastifyReply, error: unknown) {
  if (error instanceof HttpError) {
    return reply.status(error.statusCode).send({ success: false, error: error.message });
  }

  if (error instanceof ZodError) {
    return reply.status(400).send({
      success: false,
      error: 'Invalid request',
      details: issueDetails(error),
    });
  }

  if (isMarketplaceError(error)) {
    return reply.status(statusForCode(error.code)).send({
      success: false,
      error: error.message,
      code: error.code,
      details: error.details,
    });
  }

  if (error instanceof TokenRegistryError) {
    return reply.status(409).send({
      success: false,
      error: error.message,
      code: 'TokenRegistryError',
      details: {},
    });
  }

  logger.api.error(
    request.method,
    request.url,
    error instanceof Error ? error : new Error(String(error))
  );
  return reply.status(500).send({ success: false, error: 'Internal server error' });
}
