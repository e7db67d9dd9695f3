/**
 * Listing Ledger
 *
 * Fixed-price listings keyed by (asset, tokenId). A listing exists from
 * listItem until cancelListing or buyItem removes it; its price is always
 * positive while it exists.
 */

import { MarketplaceError } from '../errors';
import type { OperationContext } from '../ports';
import type { SettlementEngine } from '../settlement/engine';
import type {
  BuyItemInput,
  Identity,
  Listing,
  ListItemInput,
  SettlementRecord,
  TokenKey,
  UpdateListingInput,
} from '../types';
import { logger } from '../utils/logger';
import { keyDetails, tokenKey } from './keys';

export interface MarketplaceIdentity {
  operator: Identity;
  // Address the registry must approve and that holds escrowed value
  custodian: Identity;
}

export class ListingLedger {
  constructor(
    private readonly settlement: SettlementEngine,
    private readonly identity: MarketplaceIdentity
  ) {}

  async listItem(ctx: OperationContext, input: ListItemInput): Promise<void> {
    const key = tokenKey(input);
    const { store, registry } = ctx.scope;

    if (await store.getListing(key)) {
      throw new MarketplaceError('AlreadyListed', keyDetails(key));
    }
    await this.requireOwner(ctx, key);
    if (input.price <= 0n) {
      throw new MarketplaceError('PriceMustBeAboveZero');
    }
    if ((await registry.getApproved(key)) !== this.identity.custodian) {
      throw new MarketplaceError('NotApprovedForMarketplace', keyDetails(key));
    }

    await store.putListing(key, { price: input.price, seller: ctx.caller });

    ctx.emit({ type: 'ItemListed', seller: ctx.caller, asset: key.asset, tokenId: key.tokenId, price: input.price });
    logger.listing.listed(key.asset, key.tokenId, ctx.caller, input.price);
  }

  async updateListing(ctx: OperationContext, input: UpdateListingInput): Promise<void> {
    const key = tokenKey(input);
    const listing = await this.requireListing(ctx, key);
    await this.requireOwner(ctx, key);
    if (input.newPrice <= 0n) {
      throw new MarketplaceError('PriceMustBeAboveZero');
    }

    await ctx.scope.store.putListing(key, { ...listing, price: input.newPrice });

    // ItemListed doubles as "current ask" for both create and update
    ctx.emit({ type: 'ItemListed', seller: ctx.caller, asset: key.asset, tokenId: key.tokenId, price: input.newPrice });
    logger.listing.repriced(key.asset, key.tokenId, ctx.caller, input.newPrice);
  }

  async cancelListing(ctx: OperationContext, input: TokenKey): Promise<void> {
    const key = tokenKey(input);
    await this.requireListing(ctx, key);
    await this.requireOwner(ctx, key);

    await ctx.scope.store.deleteListing(key);

    ctx.emit({ type: 'ItemCanceled', seller: ctx.caller, asset: key.asset, tokenId: key.tokenId });
    logger.listing.canceled(key.asset, key.tokenId, ctx.caller);
  }

  async buyItem(
    ctx: OperationContext,
    input: BuyItemInput,
    marketplaceFeeBps: number
  ): Promise<SettlementRecord> {
    const key = tokenKey(input);
    const listing = await this.requireListing(ctx, key);
    if (input.paidAmount < listing.price) {
      throw new MarketplaceError('PriceNotMet', { ...keyDetails(key), price: listing.price.toString() });
    }

    // Anything paid above the price stays in custody
    await ctx.scope.value.collect(ctx.caller, input.paidAmount);

    // Effects before interactions: the listing is gone before the token or
    // any value moves
    await ctx.scope.store.deleteListing(key);
    await ctx.scope.registry.safeTransferFrom(this.identity.custodian, listing.seller, ctx.caller, key);

    const record = await this.settlement.settle(ctx, {
      totalPrice: listing.price,
      authorization: input.authorization,
      collectionOwner: input.collectionOwner,
      collectionFeeBps: input.collectionFeeBps,
      payee: listing.seller,
      counterparty: ctx.caller,
      marketplaceOperator: this.identity.operator,
      marketplaceFeeBps,
    });

    ctx.emit({ type: 'ItemBought', buyer: ctx.caller, asset: key.asset, tokenId: key.tokenId, price: listing.price });
    logger.listing.bought(key.asset, key.tokenId, ctx.caller, listing.price, input.paidAmount);

    return record;
  }

  private async requireListing(ctx: OperationContext, key: TokenKey): Promise<Listing> {
    const listing = await ctx.scope.store.getListing(key);
    if (!listing || listing.price <= 0n) {
      throw new MarketplaceError('NotListed', keyDetails(key));
    }
    return listing;
  }

  private async requireOwner(ctx: OperationContext, key: TokenKey): Promise<void> {
    const owner = await ctx.scope.registry.ownerOf(key);
    if (owner !== ctx.caller) {
      throw new MarketplaceError('NotOwner', { ...keyDetails(key), caller: ctx.caller });
    }
  }
}
