/**
 * Proceeds split.
 *
 * Marketplace and collection shares are floored independently; the payee
 * takes the remainder so the three always add back up to the price.
 */

import { MarketplaceError } from '../errors';
import { BPS_DENOMINATOR } from '../types';

export interface ProceedsShares {
  marketplaceShare: bigint;
  collectionShare: bigint;
  payeeShare: bigint;
}

export function assertFeeBps(feeBps: number, field: string): void {
  if (!Number.isInteger(feeBps) || feeBps < 0 || feeBps > BPS_DENOMINATOR) {
    throw new MarketplaceError('InvalidFeeBasisPoints', { field, feeBps: String(feeBps) });
  }
}

export function computeShares(
  totalPrice: bigint,
  marketplaceFeeBps: number,
  collectionFeeBps: number
): ProceedsShares {
  assertFeeBps(marketplaceFeeBps, 'marketplaceFeeBps');
  assertFeeBps(collectionFeeBps, 'collectionFeeBps');

  if (marketplaceFeeBps + collectionFeeBps > BPS_DENOMINATOR) {
    throw new MarketplaceError('CombinedFeesExceedPrice', {
      marketplaceFeeBps: String(marketplaceFeeBps),
      collectionFeeBps: String(collectionFeeBps),
    });
  }

  const denominator = BigInt(BPS_DENOMINATOR);
  const marketplaceShare = (totalPrice * BigInt(marketplaceFeeBps)) / denominator;
  const collectionShare = (totalPrice * BigInt(collectionFeeBps)) / denominator;

  return {
    marketplaceShare,
    collectionShare,
    payeeShare: totalPrice - marketplaceShare - collectionShare,
  };
}
