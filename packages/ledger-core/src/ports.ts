/**
 * Collaborator boundaries.
 *
 * The marketplace never touches a database, a token contract or a payment
 * rail directly; an ExecutionHost hands each call a LedgerScope whose
 * store, registry and value primitive all commit or roll back together.
 */

import type {
  FeeAuthorization,
  Identity,
  Listing,
  MarketplaceEvent,
  TokenKey,
} from './types';

export interface LedgerStore {
  getListing(key: TokenKey): Promise<Listing | null>;
  putListing(key: TokenKey, listing: Listing): Promise<void>;
  deleteListing(key: TokenKey): Promise<void>;
  // 0n when no offer exists
  getOffer(key: TokenKey, offerer: Identity): Promise<bigint>;
  // Writing 0n removes the offer
  setOffer(key: TokenKey, offerer: Identity, amount: bigint): Promise<void>;
  getMarketplaceFee(): Promise<number>;
  setMarketplaceFee(feeBps: number): Promise<void>;
}

/** ERC721-style ownership registry. */
export interface TokenRegistry {
  ownerOf(key: TokenKey): Promise<Identity>;
  getApproved(key: TokenKey): Promise<Identity | null>;
  /** Throws TokenRegistryError when `operator` may not move the token. */
  safeTransferFrom(operator: Identity, from: Identity, to: Identity, key: TokenKey): Promise<void>;
}

/**
 * Native value movement between accounts and marketplace custody.
 */
export interface ValueTransfer {
  /** Move value attached to a call into custody. Throws InsufficientFunds. */
  collect(from: Identity, amount: bigint): Promise<void>;
  /** Pay out of custody. Reports failure instead of throwing. */
  transfer(to: Identity, amount: bigint): Promise<boolean>;
}

export interface SignatureOracle {
  /** Identity that produced the signature over `message`, or null. */
  recoverSigner(message: string, authorization: FeeAuthorization): Identity | null;
}

export interface LedgerScope {
  store: LedgerStore;
  registry: TokenRegistry;
  value: ValueTransfer;
}

export interface ExecutionHost {
  /** Run `work` as one all-or-nothing unit; a thrown error undoes every write. */
  runAtomic<T>(work: (scope: LedgerScope) => Promise<T>): Promise<T>;
  /** Read-only access outside any mutation. */
  view<T>(read: (store: LedgerStore) => Promise<T>): Promise<T>;
}

/** Per-call context handed to the ledgers. */
export interface OperationContext {
  scope: LedgerScope;
  caller: Identity;
  emit(event: MarketplaceEvent): void;
}
