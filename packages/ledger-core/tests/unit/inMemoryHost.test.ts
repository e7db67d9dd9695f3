/**
 * Unit Tests for the In-Memory Host's isolation
 */

import {
  ASSET,
  authorize,
  BUYER,
  COLLECTION_FEE_BPS,
  COLLECTION_OWNER,
  createTestMarket,
  CUSTODIAN,
  mintApproved,
  SELLER,
  token,
  VAULT,
  type TestMarket,
} from '../helpers/fixtures';

const PRICE = 100000000000000000n;
const LISTED = token(0n);
const MINTED_MID_CALL = token(5n);

let market: TestMarket;
let reachedSeller: () => void;
let settleSeller: (accepted: boolean) => void;
let sellerReached: Promise<void>;

beforeEach(async () => {
  market = createTestMarket();
  mintApproved(market.host, LISTED, SELLER);
  market.host.deposit(BUYER, PRICE);
  await market.marketplace.listItem(SELLER, { ...LISTED, price: PRICE });

  reachedSeller = () => undefined;
  settleSeller = () => undefined;
  sellerReached = new Promise<void>((resolve) => {
    reachedSeller = resolve;
  });
  const decision = new Promise<boolean>((resolve) => {
    settleSeller = resolve;
  });
  market.host.onReceive(SELLER, () => {
    reachedSeller();
    return decision;
  });
});

function buy() {
  return market.marketplace.buyItem(BUYER, {
    ...LISTED,
    paidAmount: PRICE,
    authorization: authorize(BUYER),
    collectionOwner: COLLECTION_OWNER,
    collectionFeeBps: COLLECTION_FEE_BPS,
  });
}

describe('InMemoryExecutionHost while a call is in flight', () => {
  it('reads committed state only', async () => {
    const purchase = buy();
    await sellerReached;

    await expect(market.marketplace.getListing(ASSET, 0n)).resolves.toEqual({
      price: PRICE,
      seller: SELLER,
    });
    expect(market.host.ownerOf(LISTED)).toBe(SELLER);
    expect(market.host.balanceOf(BUYER)).toBe(PRICE);
    expect(market.host.balanceOf(CUSTODIAN)).toBe(0n);

    settleSeller(false);
    await expect(purchase).rejects.toMatchObject({ code: 'SellerProceedsTransferFailed' });
  });

  it('keeps admin writes made during a call that rolls back', async () => {
    const purchase = buy();
    await sellerReached;

    market.host.deposit(VAULT, 5n);
    market.host.mint(MINTED_MID_CALL, VAULT);
    settleSeller(false);

    await expect(purchase).rejects.toMatchObject({ code: 'SellerProceedsTransferFailed' });
    expect(market.host.balanceOf(VAULT)).toBe(5n);
    expect(market.host.ownerOf(MINTED_MID_CALL)).toBe(VAULT);
    expect(market.host.ownerOf(LISTED)).toBe(SELLER);
    expect(market.host.balanceOf(BUYER)).toBe(PRICE);
  });

  it('keeps admin writes made during a call that commits', async () => {
    const purchase = buy();
    await sellerReached;

    market.host.deposit(VAULT, 5n);
    settleSeller(true);

    await purchase;
    expect(market.host.balanceOf(VAULT)).toBe(5n);
    expect(market.host.ownerOf(LISTED)).toBe(BUYER);
    expect(market.host.balanceOf(SELLER)).toBe(96000000000000000n);
    expect(market.host.balanceOf(CUSTODIAN)).toBe(0n);
  });
});
