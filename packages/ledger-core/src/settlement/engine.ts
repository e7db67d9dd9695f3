/**
 * Settlement Engine
 *
 * Shared by purchase and offer acceptance. Verifies the operator's fee
 * authorization, splits the price three ways and pays each leg out of
 * custody. Any failure throws; the caller's execution host then undoes the
 * listing/offer removal and token transfer that preceded settlement.
 */

import { MarketplaceError, type MarketplaceErrorCode } from '../errors';
import type { OperationContext, SignatureOracle } from '../ports';
import type { FeeAuthorization, Identity, SettlementRecord } from '../types';
import { logger } from '../utils/logger';
import { buildFeeAuthorizationMessage } from './authorization';
import { computeShares } from './shares';

export interface SettleParams {
  totalPrice: bigint;
  authorization: FeeAuthorization;
  collectionOwner: Identity;
  collectionFeeBps: number;
  payee: Identity;
  // Whoever invoked the enclosing purchase/accept call
  counterparty: Identity;
  marketplaceOperator: Identity;
  marketplaceFeeBps: number;
}

export class SettlementEngine {
  constructor(private readonly signatures: SignatureOracle) {}

  async settle(ctx: OperationContext, params: SettleParams): Promise<SettlementRecord> {
    this.verifyAuthorization(params);

    const shares = computeShares(
      params.totalPrice,
      params.marketplaceFeeBps,
      params.collectionFeeBps
    );

    await this.payOut(ctx, params.marketplaceOperator, shares.marketplaceShare, 'MarketplaceProceedsTransferFailed');
    await this.payOut(ctx, params.collectionOwner, shares.collectionShare, 'CollectionOwnerProceedsTransferFailed');
    await this.payOut(ctx, params.payee, shares.payeeShare, 'SellerProceedsTransferFailed');

    ctx.emit({
      type: 'ProceedsTransferred',
      payee: params.payee,
      price: params.totalPrice,
      marketplaceFeeBps: params.marketplaceFeeBps,
      collectionFeeBps: params.collectionFeeBps,
    });
    logger.settlement.completed(params.payee, params.totalPrice, { ...shares });

    return {
      totalPrice: params.totalPrice,
      ...shares,
      marketplaceFeeBps: params.marketplaceFeeBps,
      collectionFeeBps: params.collectionFeeBps,
    };
  }

  private verifyAuthorization(params: SettleParams): void {
    const message = buildFeeAuthorizationMessage({
      collectionOwner: params.collectionOwner,
      collectionFeeBps: params.collectionFeeBps,
      counterparty: params.counterparty,
    });

    const signer = this.signatures.recoverSigner(message, params.authorization);
    if (signer !== params.marketplaceOperator) {
      logger.auth.badAuthorization(params.counterparty, params.collectionOwner);
      throw new MarketplaceError('NotSignedByMarketplaceOwner', {
        counterparty: params.counterparty,
      });
    }
  }

  private async payOut(
    ctx: OperationContext,
    recipient: Identity,
    amount: bigint,
    failure: MarketplaceErrorCode
  ): Promise<void> {
    const sent = await ctx.scope.value.transfer(recipient, amount);
    if (!sent) {
      logger.settlement.transferFailed(recipient, amount, failure);
      throw new MarketplaceError(failure, { recipient, amount: amount.toString() });
    }
  }
}
