/**
 * Event broadcast tests
 *
 * Uses in-memory clients in place of sockets.
 */
import { WebSocket } from 'ws';
import { MarketplaceEventBus, type MarketplaceEvent } from 'ledger-core';
import { EventBroadcaster, type BroadcastClient } from '../src/ws/broadcast';

class FakeClient implements BroadcastClient {
  readonly sent: string[] = [];

  constructor(public readyState: number = WebSocket.OPEN) {}

  send(data: string): void {
    this.sent.push(data);
  }
}

const listed: MarketplaceEvent = {
  type: 'ItemListed',
  seller: 'seller-alice',
  asset: 'basic-nft',
  tokenId: 3n,
  price: 100000000000000000n,
};

describe('EventBroadcaster', () => {
  it('sends each published event to open clients with bigints as strings', () => {
    const bus = new MarketplaceEventBus();
    const broadcaster = new EventBroadcaster(bus);
    const client = new FakeClient();
    broadcaster.track(client);
    broadcaster.listen();

    bus.publish([listed]);

    expect(client.sent).toEqual([
      JSON.stringify({
        type: 'marketplace_event',
        event: {
          type: 'ItemListed',
          seller: 'seller-alice',
          asset: 'basic-nft',
          tokenId: '3',
          price: '100000000000000000',
        },
      }),
    ]);
  });

  it('skips clients that are not open', () => {
    const broadcaster = new EventBroadcaster(new MarketplaceEventBus());
    const open = new FakeClient();
    const closing = new FakeClient(WebSocket.CLOSING);
    broadcaster.track(open);
    broadcaster.track(closing);

    expect(broadcaster.broadcast(listed)).toBe(1);
    expect(closing.sent).toEqual([]);
  });

  it('drops a client whose send throws', () => {
    const broadcaster = new EventBroadcaster(new MarketplaceEventBus());
    const broken: BroadcastClient = {
      readyState: WebSocket.OPEN,
      send: () => {
        throw new Error('socket gone');
      },
    };
    broadcaster.track(broken);

    expect(broadcaster.broadcast(listed)).toBe(0);
    expect(broadcaster.clientCount).toBe(0);
  });

  it('stops forwarding after close', () => {
    const bus = new MarketplaceEventBus();
    const broadcaster = new EventBroadcaster(bus);
    broadcaster.listen();

    broadcaster.close();

    expect(bus.listenerCount).toBe(0);
    expect(broadcaster.clientCount).toBe(0);
  });
});
