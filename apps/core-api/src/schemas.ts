/**
 * Request schemas and response shapes.
 *
 * Amounts and token ids travel as decimal strings on the wire and become
 * bigint before they reach the ledger.
 */
import { z } from 'zod';
import {
  identitySchema,
  type ListingView,
  type SettlementRecord,
} from 'ledger-core';

export const uintSchema = z
  .string()
  .regex(/^\d+$/, 'Expected an unsigned decimal integer')
  .max(78, 'Value too large')
  .transform((value) => BigInt(value));

const feeBpsSchema = z.number().int('Fee must be a whole number of basis points');

const authorizationSchema = z.object({
  signer: z.string().min(1),
  signature: z.string().min(1),
});

const collectionTermsSchema = {
  authorization: authorizationSchema,
  collectionOwner: identitySchema,
  collectionFeeBps: feeBpsSchema,
};

// ── Params ──

export const tokenParamsSchema = z.object({
  asset: identitySchema,
  tokenId: uintSchema,
});

export const offerParamsSchema = tokenParamsSchema.extend({
  offerer: identitySchema,
});

// ── Bodies ──

export const listItemSchema = z.object({
  asset: identitySchema,
  tokenId: uintSchema,
  price: uintSchema,
});

export const updateListingSchema = z.object({
  newPrice: uintSchema,
});

export const buyItemSchema = z.object({
  paidAmount: uintSchema,
  ...collectionTermsSchema,
});

export const makeOfferSchema = z.object({
  asset: identitySchema,
  tokenId: uintSchema,
  offerPrice: uintSchema,
  stakedAmount: uintSchema,
});

export const acceptOfferSchema = z.object({
  offerer: identitySchema,
  ...collectionTermsSchema,
});

export const marketplaceFeeSchema = z.object({
  feeBps: feeBpsSchema,
});

// ── Responses ──

export function listingResponse(asset: string, tokenId: bigint, listing: ListingView) {
  return {
    asset,
    tokenId: tokenId.toString(),
    price: listing.price.toString(),
    seller: listing.seller,
  };
}

export function settlementResponse(record: SettlementRecord) {
  return {
    totalPrice: record.totalPrice.toString(),
    marketplaceShare: record.marketplaceShare.toString(),
    collectionShare: record.collectionShare.toString(),
    payeeShare: record.payeeShare.toString(),
    marketplaceFeeBps: record.marketplaceFeeBps,
    collectionFeeBps: record.collectionFeeBps,
  };
}
