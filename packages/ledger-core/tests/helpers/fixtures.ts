import nacl from 'tweetnacl';
import {
  InMemoryExecutionHost,
  Marketplace,
  NaclSignatureOracle,
  identityFromPublicKey,
  signFeeAuthorization,
  type FeeAuthorization,
  type MarketplaceEvent,
  type TokenKey,
} from 'ledger-core';

// Deterministic keys; never used outside tests
export const operatorKeys = nacl.sign.keyPair.fromSeed(new Uint8Array(32).fill(7));
export const strangerKeys = nacl.sign.keyPair.fromSeed(new Uint8Array(32).fill(9));

export const OPERATOR = identityFromPublicKey(operatorKeys.publicKey);
export const CUSTODIAN = 'marketplace-custody';
export const SELLER = 'seller-alice';
export const BUYER = 'buyer-bob';
export const VAULT = 'buyer-vault';
export const COLLECTION_OWNER = 'collection-owner';
export const ASSET = 'basic-nft';

export const MARKETPLACE_FEE_BPS = 250;
export const COLLECTION_FEE_BPS = 150;

export function token(tokenId: bigint): TokenKey {
  return { asset: ASSET, tokenId };
}

export function authorize(
  counterparty: string,
  collectionOwner: string = COLLECTION_OWNER,
  collectionFeeBps: number = COLLECTION_FEE_BPS,
  secretKey: Uint8Array = operatorKeys.secretKey
): FeeAuthorization {
  return signFeeAuthorization(secretKey, { collectionOwner, collectionFeeBps, counterparty });
}

export interface TestMarket {
  host: InMemoryExecutionHost;
  marketplace: Marketplace;
  events: MarketplaceEvent[];
}

export function createTestMarket(): TestMarket {
  const host = new InMemoryExecutionHost({
    custodian: CUSTODIAN,
    marketplaceFeeBps: MARKETPLACE_FEE_BPS,
  });
  const marketplace = new Marketplace({
    host,
    signatures: new NaclSignatureOracle(),
    operator: OPERATOR,
    custodian: CUSTODIAN,
  });
  const events: MarketplaceEvent[] = [];
  marketplace.events.subscribe((event) => {
    events.push(event);
  });
  return { host, marketplace, events };
}

/** Mint to `owner` and approve the marketplace custodian. */
export function mintApproved(host: InMemoryExecutionHost, key: TokenKey, owner: string): void {
  host.mint(key, owner);
  host.approve(owner, key, CUSTODIAN);
}

/** Await a promise that must reject and return the error. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected promise to reject');
}
