/**
 * WebSocket event broadcast
 *
 * Clients connect to /ws/events and receive every committed marketplace
 * event as JSON. There is no per-client filtering; the event feed is public.
 */
import type { Server } from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import {
  logger,
  serializeEvent,
  type MarketplaceEvent,
  type MarketplaceEventBus,
} from 'ledger-core';

export const EVENTS_PATH = '/ws/events';

/** The part of a socket the broadcaster needs. */
export interface BroadcastClient {
  readonly readyState: number;
  send(data: string): void;
}

export class EventBroadcaster {
  private readonly clients = new Set<BroadcastClient>();
  private server: WebSocketServer | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly events: MarketplaceEventBus) {}

  /** Start accepting sockets on the HTTP server and forwarding events. */
  attach(httpServer: Server): void {
    this.server = new WebSocketServer({ server: httpServer, path: EVENTS_PATH });
    this.server.on('connection', (socket) => {
      this.track(socket);
      socket.on('close', () => this.untrack(socket));
      socket.on('error', (err) => {
        logger.warn('WebSocket client error', { reason: err.message });
      });
    });
    this.listen();
  }

  listen(): void {
    if (this.unsubscribe) return;
    this.unsubscribe = this.events.subscribe((event) => {
      this.broadcast(event);
    });
  }

  track(client: BroadcastClient): void {
    this.clients.add(client);
  }

  untrack(client: BroadcastClient): void {
    this.clients.delete(client);
  }

  /** Returns how many clients the event was written to. */
  broadcast(event: MarketplaceEvent): number {
    const payload = JSON.stringify({ type: 'marketplace_event', event: serializeEvent(event) });
    let delivered = 0;

    for (const client of this.clients) {
      if (client.readyState !== WebSocket.OPEN) continue;
      try {
        client.send(payload);
        delivered++;
      } catch (error) {
        logger.warn('WebSocket send failed', {
          eventType: event.type,
          reason: error instanceof Error ? error.message : String(error),
        });
        this.clients.delete(client);
      }
    }

    return delivered;
  }

  get clientCount(): number {
    return this.clients.size;
  }

  close(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    for (const client of this.clients) {
      if (client instanceof WebSocket) client.close();
    }
    this.clients.clear();
    this.server?.close();
    this.server = null;
  }
}
