/**
 * Offer Ledger
 *
 * Standing offers keyed by (asset, tokenId, offerer). The staked value sits
 * in marketplace custody until the offer is canceled (refunded) or accepted
 * (settled to the owner).
 */

import { MarketplaceError } from '../errors';
import type { OperationContext } from '../ports';
import type { SettlementEngine } from '../settlement/engine';
import type { AcceptOfferInput, MakeOfferInput, SettlementRecord, TokenKey } from '../types';
import { logger } from '../utils/logger';
import { keyDetails, tokenKey } from './keys';
import type { MarketplaceIdentity } from './listingLedger';

export class OfferLedger {
  constructor(
    private readonly settlement: SettlementEngine,
    private readonly identity: MarketplaceIdentity
  ) {}

  async makeOffer(ctx: OperationContext, input: MakeOfferInput): Promise<void> {
    const key = tokenKey(input);
    const { store, registry, value } = ctx.scope;

    if ((await registry.ownerOf(key)) === ctx.caller) {
      throw new MarketplaceError('CanNotBeOwner', keyDetails(key));
    }
    if ((await store.getOffer(key, ctx.caller)) > 0n) {
      throw new MarketplaceError('AlreadyOffered', { ...keyDetails(key), offerer: ctx.caller });
    }
    if (input.stakedAmount < input.offerPrice) {
      throw new MarketplaceError('OfferPriceNotMet', { ...keyDetails(key), price: input.offerPrice.toString() });
    }
    if (input.offerPrice <= 0n) {
      throw new MarketplaceError('PriceMustBeAboveZero');
    }

    // The whole stake goes to custody; only offerPrice is recorded, so any
    // surplus is neither tracked nor refunded
    await value.collect(ctx.caller, input.stakedAmount);
    await store.setOffer(key, ctx.caller, input.offerPrice);

    ctx.emit({ type: 'ItemOffered', offerer: ctx.caller, asset: key.asset, tokenId: key.tokenId, price: input.offerPrice });
    logger.offer.made(key.asset, key.tokenId, ctx.caller, input.offerPrice, input.stakedAmount);
  }

  async cancelOffer(ctx: OperationContext, input: TokenKey): Promise<void> {
    const key = tokenKey(input);
    const { store, registry, value } = ctx.scope;

    const amount = await store.getOffer(key, ctx.caller);
    if (amount === 0n) {
      throw new MarketplaceError('NoOffered', { ...keyDetails(key), offerer: ctx.caller });
    }
    if ((await registry.ownerOf(key)) === ctx.caller) {
      throw new MarketplaceError('CanNotBeOwner', keyDetails(key));
    }

    await store.setOffer(key, ctx.caller, 0n);
    const refunded = await value.transfer(ctx.caller, amount);
    if (!refunded) {
      logger.settlement.transferFailed(ctx.caller, amount, 'CancelOfferProceedsTransferFailed');
      throw new MarketplaceError('CancelOfferProceedsTransferFailed', {
        recipient: ctx.caller,
        amount: amount.toString(),
      });
    }

    ctx.emit({ type: 'ItemOfferCanceled', offerer: ctx.caller, asset: key.asset, tokenId: key.tokenId });
    logger.offer.canceled(key.asset, key.tokenId, ctx.caller, amount);
  }

  async acceptOffer(
    ctx: OperationContext,
    input: AcceptOfferInput,
    marketplaceFeeBps: number
  ): Promise<SettlementRecord> {
    const key = tokenKey(input);
    const { store, registry } = ctx.scope;

    if ((await registry.ownerOf(key)) !== ctx.caller) {
      throw new MarketplaceError('NotOwner', { ...keyDetails(key), caller: ctx.caller });
    }
    const amount = await store.getOffer(key, input.offerer);
    if (amount === 0n) {
      throw new MarketplaceError('NoOffered', { ...keyDetails(key), offerer: input.offerer });
    }

    // Zeroed before the token moves so a second accept finds nothing
    await store.setOffer(key, input.offerer, 0n);
    await registry.safeTransferFrom(this.identity.custodian, ctx.caller, input.offerer, key);

    const record = await this.settlement.settle(ctx, {
      totalPrice: amount,
      authorization: input.authorization,
      collectionOwner: input.collectionOwner,
      collectionFeeBps: input.collectionFeeBps,
      payee: ctx.caller,
      counterparty: ctx.caller,
      marketplaceOperator: this.identity.operator,
      marketplaceFeeBps,
    });

    ctx.emit({
      type: 'ItemOfferAccepted',
      owner: ctx.caller,
      offerer: input.offerer,
      asset: key.asset,
      tokenId: key.tokenId,
      price: amount,
    });
    logger.offer.accepted(key.asset, key.tokenId, ctx.caller, input.offerer, amount);

    return record;
  }
}
