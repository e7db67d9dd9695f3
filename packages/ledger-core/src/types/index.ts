/**
 * Marketplace Ledger Types
 *
 * Identities are opaque strings (base58 public keys for signing parties).
 * Token ids, prices and balances are unsigned integers carried as bigint.
 */

export type Identity = string;

export interface TokenKey {
  asset: Identity;
  tokenId: bigint;
}

export interface Listing {
  price: bigint;
  seller: Identity;
}

// Read shape: an absent listing comes back as { price: 0n, seller: null }
export interface ListingView {
  price: bigint;
  seller: Identity | null;
}

export const NOT_LISTED: ListingView = Object.freeze({ price: 0n, seller: null });

export const BPS_DENOMINATOR = 10000;

export const DEFAULT_MARKETPLACE_FEE_BPS = 250;

// Signature from the marketplace operator over a FeeAuthorizationTerms message
export interface FeeAuthorization {
  signer: Identity;
  signature: string;
}

export interface FeeAuthorizationTerms {
  collectionOwner: Identity;
  collectionFeeBps: number;
  counterparty: Identity;
}

export interface SettlementRecord {
  totalPrice: bigint;
  marketplaceShare: bigint;
  collectionShare: bigint;
  payeeShare: bigint;
  marketplaceFeeBps: number;
  collectionFeeBps: number;
}

// ── Operation inputs ──

export interface ListItemInput extends TokenKey {
  price: bigint;
}

export interface UpdateListingInput extends TokenKey {
  newPrice: bigint;
}

export interface CollectionTerms {
  authorization: FeeAuthorization;
  collectionOwner: Identity;
  collectionFeeBps: number;
}

export interface BuyItemInput extends TokenKey, CollectionTerms {
  paidAmount: bigint;
}

export interface MakeOfferInput extends TokenKey {
  offerPrice: bigint;
  stakedAmount: bigint;
}

export interface AcceptOfferInput extends TokenKey, CollectionTerms {
  offerer: Identity;
}

// ── Events ──

export interface ItemListedEvent {
  type: 'ItemListed';
  seller: Identity;
  asset: Identity;
  tokenId: bigint;
  price: bigint;
}

export interface ItemCanceledEvent {
  type: 'ItemCanceled';
  seller: Identity;
  asset: Identity;
  tokenId: bigint;
}

export interface ItemBoughtEvent {
  type: 'ItemBought';
  buyer: Identity;
  asset: Identity;
  tokenId: bigint;
  price: bigint;
}

export interface ProceedsTransferredEvent {
  type: 'ProceedsTransferred';
  payee: Identity;
  price: bigint;
  marketplaceFeeBps: number;
  collectionFeeBps: number;
}

export interface ItemOfferedEvent {
  type: 'ItemOffered';
  offerer: Identity;
  asset: Identity;
  tokenId: bigint;
  price: bigint;
}

export interface ItemOfferCanceledEvent {
  type: 'ItemOfferCanceled';
  offerer: Identity;
  asset: Identity;
  tokenId: bigint;
}

export interface ItemOfferAcceptedEvent {
  type: 'ItemOfferAccepted';
  owner: Identity;
  offerer: Identity;
  asset: Identity;
  tokenId: bigint;
  price: bigint;
}

export interface MarketplaceFeeUpdatedEvent {
  type: 'MarketplaceFeeUpdated';
  previousFeeBps: number;
  feeBps: number;
}

export type MarketplaceEvent =
  | ItemListedEvent
  | ItemCanceledEvent
  | ItemBoughtEvent
  | ProceedsTransferredEvent
  | ItemOfferedEvent
  | ItemOfferCanceledEvent
  | ItemOfferAcceptedEvent
  | MarketplaceFeeUpdatedEvent;
