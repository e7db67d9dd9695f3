/**
 * Marketplace
 *
 * Public surface of the listing/offer ledger. Every mutating call:
 *   1. takes the reentrancy guard (serial, reentrant calls rejected)
 *   2. runs inside one atomic scope of the execution host
 *   3. publishes its buffered events only after that scope commits
 */

import { MarketplaceError, isMarketplaceError } from './errors';
import { MarketplaceEventBus } from './events/eventBus';
import { ReentrancyGuard } from './guard/reentrancyGuard';
import { ListingLedger, type MarketplaceIdentity } from './ledger/listingLedger';
import { tokenKey } from './ledger/keys';
import { OfferLedger } from './ledger/offerLedger';
import type { ExecutionHost, OperationContext, SignatureOracle } from './ports';
import { SettlementEngine } from './settlement/engine';
import { assertFeeBps } from './settlement/shares';
import {
  NOT_LISTED,
  type AcceptOfferInput,
  type BuyItemInput,
  type Identity,
  type ListingView,
  type ListItemInput,
  type MakeOfferInput,
  type MarketplaceEvent,
  type SettlementRecord,
  type TokenKey,
  type UpdateListingInput,
} from './types';
import { logger } from './utils/logger';

export interface MarketplaceOptions {
  host: ExecutionHost;
  signatures: SignatureOracle;
  operator: Identity;
  custodian: Identity;
  events?: MarketplaceEventBus;
  guard?: ReentrancyGuard;
}

export class Marketplace {
  readonly events: MarketplaceEventBus;

  private readonly host: ExecutionHost;
  private readonly guard: ReentrancyGuard;
  private readonly identity: MarketplaceIdentity;
  private readonly listings: ListingLedger;
  private readonly offers: OfferLedger;

  constructor(options: MarketplaceOptions) {
    this.host = options.host;
    this.events = options.events ?? new MarketplaceEventBus();
    this.guard = options.guard ?? new ReentrancyGuard();
    this.identity = { operator: options.operator, custodian: options.custodian };

    const settlement = new SettlementEngine(options.signatures);
    this.listings = new ListingLedger(settlement, this.identity);
    this.offers = new OfferLedger(settlement, this.identity);
  }

  // ── Listings ──

  listItem(caller: Identity, input: ListItemInput): Promise<void> {
    return this.execute('listItem', caller, (ctx) => this.listings.listItem(ctx, input));
  }

  updateListing(caller: Identity, input: UpdateListingInput): Promise<void> {
    return this.execute('updateListing', caller, (ctx) => this.listings.updateListing(ctx, input));
  }

  cancelListing(caller: Identity, input: TokenKey): Promise<void> {
    return this.execute('cancelListing', caller, (ctx) => this.listings.cancelListing(ctx, input));
  }

  buyItem(caller: Identity, input: BuyItemInput): Promise<SettlementRecord> {
    return this.execute('buyItem', caller, async (ctx) => {
      const feeBps = await ctx.scope.store.getMarketplaceFee();
      return this.listings.buyItem(ctx, input, feeBps);
    });
  }

  // ── Offers ──

  makeOffer(caller: Identity, input: MakeOfferInput): Promise<void> {
    return this.execute('makeOffer', caller, (ctx) => this.offers.makeOffer(ctx, input));
  }

  cancelOffer(caller: Identity, input: TokenKey): Promise<void> {
    return this.execute('cancelOffer', caller, (ctx) => this.offers.cancelOffer(ctx, input));
  }

  acceptOffer(caller: Identity, input: AcceptOfferInput): Promise<SettlementRecord> {
    return this.execute('acceptOffer', caller, async (ctx) => {
      const feeBps = await ctx.scope.store.getMarketplaceFee();
      return this.offers.acceptOffer(ctx, input, feeBps);
    });
  }

  // ── Configuration ──

  setMarketplaceFee(caller: Identity, feeBps: number): Promise<void> {
    return this.execute('setMarketplaceFee', caller, async (ctx) => {
      if (ctx.caller !== this.identity.operator) {
        throw new MarketplaceError('NotMarketplaceOwner', { caller: ctx.caller });
      }
      assertFeeBps(feeBps, 'feeBps');

      const previousFeeBps = await ctx.scope.store.getMarketplaceFee();
      await ctx.scope.store.setMarketplaceFee(feeBps);
      ctx.emit({ type: 'MarketplaceFeeUpdated', previousFeeBps, feeBps });
      logger.info('Marketplace fee updated', { previousFeeBps, feeBps });
    });
  }

  // ── Reads ──

  getListing(asset: Identity, tokenId: bigint): Promise<ListingView> {
    return this.host.view(async (store) => {
      const listing = await store.getListing({ asset, tokenId });
      return listing ?? NOT_LISTED;
    });
  }

  getOffer(asset: Identity, tokenId: bigint, offerer: Identity): Promise<bigint> {
    return this.host.view((store) => store.getOffer(tokenKey({ asset, tokenId }), offerer));
  }

  getMarketplaceFee(): Promise<number> {
    return this.host.view((store) => store.getMarketplaceFee());
  }

  getOperator(): Identity {
    return this.identity.operator;
  }

  getCustodian(): Identity {
    return this.identity.custodian;
  }

  private async execute<T>(
    operation: string,
    caller: Identity,
    work: (ctx: OperationContext) => Promise<T>
  ): Promise<T> {
    const emitted: MarketplaceEvent[] = [];

    try {
      const result = await this.guard.run(operation, () =>
        this.host.runAtomic((scope) =>
          work({ scope, caller, emit: (event) => emitted.push(event) })
        )
      );
      this.events.publish(emitted);
      return result;
    } catch (error) {
      if (isMarketplaceError(error)) {
        logger.settlement.reverted(operation, error.code, caller);
      }
      throw error;
    }
  }
}
