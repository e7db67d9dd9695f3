/**
 * In-memory execution host
 *
 * Store, token registry and account balances live in one process-local
 * world. runAtomic works on a draft copy of the committed world and swaps it
 * in only when the call returns, which gives the same all-or-nothing result
 * as a database transaction. Reads outside a call see committed state only.
 * Used by the dev server and the test suite.
 */

import { MarketplaceError, TokenRegistryError } from '../errors';
import type {
  ExecutionHost,
  LedgerScope,
  LedgerStore,
  TokenRegistry,
  ValueTransfer,
} from '../ports';
import { DEFAULT_MARKETPLACE_FEE_BPS, type Identity, type Listing, type TokenKey } from '../types';
import { logger } from '../utils/logger';

interface TokenRecord {
  owner: Identity;
  approved: Identity | null;
}

interface WorldState {
  listings: Map<string, Listing>;
  offers: Map<string, bigint>;
  marketplaceFeeBps: number;
  tokens: Map<string, TokenRecord>;
  balances: Map<Identity, bigint>;
}

/**
 * Called when value arrives at an account. Returning false (or throwing)
 * makes the transfer fail, like a contract that rejects incoming value.
 */
export type ReceiveHook = (amount: bigint) => Promise<boolean> | boolean;

function slot(key: TokenKey): string {
  return `${key.asset}:${key.tokenId.toString()}`;
}

function offerSlot(key: TokenKey, offerer: Identity): string {
  return `${slot(key)}:${offerer}`;
}

function cloneState(state: WorldState): WorldState {
  return {
    listings: new Map(Array.from(state.listings, ([k, v]) => [k, { ...v }])),
    offers: new Map(state.offers),
    marketplaceFeeBps: state.marketplaceFeeBps,
    tokens: new Map(Array.from(state.tokens, ([k, v]) => [k, { ...v }])),
    balances: new Map(state.balances),
  };
}

function balanceIn(state: WorldState, account: Identity): bigint {
  return state.balances.get(account) ?? 0n;
}

function credit(state: WorldState, account: Identity, amount: bigint): void {
  state.balances.set(account, balanceIn(state, account) + amount);
}

function requireToken(state: WorldState, key: TokenKey): TokenRecord {
  const token = state.tokens.get(slot(key));
  if (!token) {
    throw new TokenRegistryError(`Token ${slot(key)} does not exist`);
  }
  return token;
}

export interface InMemoryHostOptions {
  custodian: Identity;
  marketplaceFeeBps?: number;
}

export class InMemoryExecutionHost implements ExecutionHost {
  readonly custodian: Identity;

  private committed: WorldState;
  private draft: WorldState | null = null;
  private tail: Promise<void> = Promise.resolve();
  private readonly receiveHooks = new Map<Identity, ReceiveHook>();
  private readonly scope: LedgerScope;

  constructor(options: InMemoryHostOptions) {
    this.custodian = options.custodian;
    this.committed = {
      listings: new Map(),
      offers: new Map(),
      marketplaceFeeBps: options.marketplaceFeeBps ?? DEFAULT_MARKETPLACE_FEE_BPS,
      tokens: new Map(),
      balances: new Map(),
    };
    this.scope = {
      store: this.createStore(() => this.working()),
      registry: this.createRegistry(),
      value: this.createValueTransfer(),
    };
  }

  async runAtomic<T>(work: (scope: LedgerScope) => Promise<T>): Promise<T> {
    let release: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => turn);

    await previous;
    const draft = cloneState(this.committed);
    this.draft = draft;
    try {
      const result = await work(this.scope);
      this.committed = draft;
      return result;
    } finally {
      this.draft = null;
      release();
    }
  }

  view<T>(read: (store: LedgerStore) => Promise<T>): Promise<T> {
    return read(this.createStore(() => this.committed));
  }

  // ── Registry administration (minting stands outside the marketplace) ──
  // Admin writes land in the committed world and in any open draft, so they
  // survive whichever way the call in flight ends.

  mint(key: TokenKey, owner: Identity): void {
    if (this.committed.tokens.has(slot(key))) {
      throw new TokenRegistryError(`Token ${slot(key)} already minted`);
    }
    for (const state of this.liveStates()) {
      state.tokens.set(slot(key), { owner, approved: null });
    }
  }

  approve(caller: Identity, key: TokenKey, spender: Identity | null): void {
    const token = requireToken(this.committed, key);
    if (token.owner !== caller) {
      throw new TokenRegistryError(`Approve caller ${caller} is not owner of ${slot(key)}`);
    }
    for (const state of this.liveStates()) {
      const record = state.tokens.get(slot(key));
      if (record) record.approved = spender;
    }
  }

  ownerOf(key: TokenKey): Identity {
    return requireToken(this.committed, key).owner;
  }

  // ── Balances ──

  deposit(account: Identity, amount: bigint): void {
    for (const state of this.liveStates()) {
      credit(state, account, amount);
    }
  }

  balanceOf(account: Identity): bigint {
    return balanceIn(this.committed, account);
  }

  onReceive(account: Identity, hook: ReceiveHook | null): void {
    if (hook) {
      this.receiveHooks.set(account, hook);
    } else {
      this.receiveHooks.delete(account);
    }
  }

  private working(): WorldState {
    return this.draft ?? this.committed;
  }

  private liveStates(): WorldState[] {
    return this.draft ? [this.committed, this.draft] : [this.committed];
  }

  private createStore(world: () => WorldState): LedgerStore {
    return {
      getListing: async (key) => {
        const listing = world().listings.get(slot(key));
        return listing ? { ...listing } : null;
      },
      putListing: async (key, listing) => {
        world().listings.set(slot(key), { ...listing });
      },
      deleteListing: async (key) => {
        world().listings.delete(slot(key));
      },
      getOffer: async (key, offerer) => world().offers.get(offerSlot(key, offerer)) ?? 0n,
      setOffer: async (key, offerer, amount) => {
        if (amount === 0n) {
          world().offers.delete(offerSlot(key, offerer));
        } else {
          world().offers.set(offerSlot(key, offerer), amount);
        }
      },
      getMarketplaceFee: async () => world().marketplaceFeeBps,
      setMarketplaceFee: async (feeBps) => {
        world().marketplaceFeeBps = feeBps;
      },
    };
  }

  private createRegistry(): TokenRegistry {
    return {
      ownerOf: async (key) => requireToken(this.working(), key).owner,
      getApproved: async (key) => requireToken(this.working(), key).approved,
      safeTransferFrom: async (operator, from, to, key) => {
        const token = requireToken(this.working(), key);
        if (token.owner !== from) {
          throw new TokenRegistryError(`Transfer from ${from}, but ${slot(key)} is owned by ${token.owner}`);
        }
        if (operator !== from && token.approved !== operator) {
          throw new TokenRegistryError(`${operator} is not approved for ${slot(key)}`);
        }
        // Approval does not survive a transfer
        token.owner = to;
        token.approved = null;
      },
    };
  }

  private createValueTransfer(): ValueTransfer {
    return {
      collect: async (from, amount) => {
        const state = this.working();
        const balance = balanceIn(state, from);
        if (balance < amount) {
          throw new MarketplaceError('InsufficientFunds', {
            account: from,
            required: amount.toString(),
            available: balance.toString(),
          });
        }
        state.balances.set(from, balance - amount);
        credit(state, this.custodian, amount);
      },
      transfer: async (to, amount) => {
        const state = this.working();
        const held = balanceIn(state, this.custodian);
        if (held < amount) return false;

        state.balances.set(this.custodian, held - amount);
        credit(state, to, amount);

        const hook = this.receiveHooks.get(to);
        if (!hook) return true;

        let accepted: boolean;
        try {
          accepted = await hook(amount);
        } catch (error) {
          logger.warn('Receive hook threw; treating transfer as failed', {
            account: to,
            reason: error instanceof Error ? error.message : String(error),
          });
          accepted = false;
        }
        if (!accepted) {
          state.balances.set(to, balanceIn(state, to) - amount);
          credit(state, this.custodian, amount);
        }
        return accepted;
      },
    };
  }
}
