/**
 * Settlement rollback: a failed payout leg leaves no trace of the call.
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
  OPERATOR,
  SELLER,
  token,
  type TestMarket,
} from '../helpers/fixtures';

const PRICE = 100000000000000000n;
const LISTED = token(0n);

let market: TestMarket;

beforeEach(async () => {
  market = createTestMarket();
  mintApproved(market.host, LISTED, SELLER);
  market.host.deposit(BUYER, PRICE);
  await market.marketplace.listItem(SELLER, { ...LISTED, price: PRICE });
  market.events.length = 0;
});

function buy(collectionFeeBps: number = COLLECTION_FEE_BPS) {
  return market.marketplace.buyItem(BUYER, {
    ...LISTED,
    paidAmount: PRICE,
    authorization: authorize(BUYER, COLLECTION_OWNER, collectionFeeBps),
    collectionOwner: COLLECTION_OWNER,
    collectionFeeBps,
  });
}

async function expectUntouched(): Promise<void> {
  await expect(market.marketplace.getListing(ASSET, 0n)).resolves.toEqual({ price: PRICE, seller: SELLER });
  expect(market.host.ownerOf(LISTED)).toBe(SELLER);
  expect(market.host.balanceOf(BUYER)).toBe(PRICE);
  expect(market.host.balanceOf(CUSTODIAN)).toBe(0n);
  expect(market.host.balanceOf(OPERATOR)).toBe(0n);
  expect(market.host.balanceOf(COLLECTION_OWNER)).toBe(0n);
  expect(market.host.balanceOf(SELLER)).toBe(0n);
  expect(market.events).toEqual([]);
}

describe('payout failures during purchase', () => {
  it.each([
    ['marketplace operator', OPERATOR, 'MarketplaceProceedsTransferFailed', '2500000000000000'],
    ['collection owner', COLLECTION_OWNER, 'CollectionOwnerProceedsTransferFailed', '1500000000000000'],
    ['seller', SELLER, 'SellerProceedsTransferFailed', '96000000000000000'],
  ])('reverts everything when the %s rejects its share', async (_label, recipient, code, amount) => {
    market.host.onReceive(recipient, () => false);

    await expect(buy()).rejects.toMatchObject({ code, details: { recipient, amount } });
    await expectUntouched();
  });

  it('treats a throwing receiver as a failed transfer', async () => {
    market.host.onReceive(SELLER, () => {
      throw new Error('receiver is broken');
    });

    await expect(buy()).rejects.toMatchObject({ code: 'SellerProceedsTransferFailed' });
    await expectUntouched();
  });

  it('still pays a zero collection share, so a rejecting owner fails the sale', async () => {
    market.host.onReceive(COLLECTION_OWNER, () => false);

    await expect(buy(0)).rejects.toMatchObject({
      code: 'CollectionOwnerProceedsTransferFailed',
      details: { recipient: COLLECTION_OWNER, amount: '0' },
    });
    await expectUntouched();
  });

  it('pays the whole remainder to the seller when the collection fee is zero', async () => {
    const record = await buy(0);

    expect(record.collectionShare).toBe(0n);
    expect(market.host.balanceOf(SELLER)).toBe(97500000000000000n);
  });
});

describe('fee limits during purchase', () => {
  it('rejects fees that add up past the price', async () => {
    await market.marketplace.setMarketplaceFee(OPERATOR, 9000);
    market.events.length = 0;

    await expect(buy(1500)).rejects.toMatchObject({
      code: 'CombinedFeesExceedPrice',
      details: { marketplaceFeeBps: '9000', collectionFeeBps: '1500' },
    });
    await expectUntouched();
  });

  it('rejects a collection fee above 10000 basis points', async () => {
    await expect(buy(10001)).rejects.toMatchObject({
      code: 'InvalidFeeBasisPoints',
      details: { field: 'collectionFeeBps', feeBps: '10001' },
    });
    await expectUntouched();
  });
});

describe('payout failures during offer acceptance', () => {
  const OFFER = 80000000000000000n;
  const OFFERED = token(1n);

  beforeEach(async () => {
    mintApproved(market.host, OFFERED, SELLER);
    market.host.deposit(BUYER, OFFER);
    await market.marketplace.makeOffer(BUYER, { ...OFFERED, offerPrice: OFFER, stakedAmount: OFFER });
    market.events.length = 0;
  });

  it('restores the offer and the token when the owner rejects proceeds', async () => {
    market.host.onReceive(SELLER, () => false);

    await expect(
      market.marketplace.acceptOffer(SELLER, {
        ...OFFERED,
        offerer: BUYER,
        authorization: authorize(SELLER),
        collectionOwner: COLLECTION_OWNER,
        collectionFeeBps: COLLECTION_FEE_BPS,
      })
    ).rejects.toMatchObject({ code: 'SellerProceedsTransferFailed' });

    await expect(market.marketplace.getOffer(ASSET, 1n, BUYER)).resolves.toBe(OFFER);
    expect(market.host.ownerOf(OFFERED)).toBe(SELLER);
    expect(market.host.balanceOf(CUSTODIAN)).toBe(OFFER);
    expect(market.host.balanceOf(OPERATOR)).toBe(0n);
    expect(market.events).toEqual([]);
  });
});

describe('event listeners', () => {
  it('do not affect the call when they throw', async () => {
    market.marketplace.events.subscribe(() => {
      throw new Error('listener failure');
    });

    await buy();

    expect(market.host.ownerOf(LISTED)).toBe(BUYER);
    expect(market.events.map((event) => event.type)).toEqual(['ProceedsTransferred', 'ItemBought']);
  });
});
