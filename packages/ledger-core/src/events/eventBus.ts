import type { MarketplaceEvent } from '../types';
import { logger } from '../utils/logger';

export type MarketplaceEventListener = (event: MarketplaceEvent) => void;

/**
 * Fan-out for committed marketplace events. Events are for external
 * observers only; a failing listener is logged and never reaches the caller.
 */
export class MarketplaceEventBus {
  private readonly listeners = new Set<MarketplaceEventListener>();

  subscribe(listener: MarketplaceEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  publish(events: readonly MarketplaceEvent[]): void {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (error) {
          logger.error(
            'Marketplace event listener failed',
            { eventType: event.type },
            error instanceof Error ? error : new Error(String(error))
          );
        }
      }
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

/** JSON-safe form of an event: bigints become decimal strings. */
export function serializeEvent(event: MarketplaceEvent): Record<string, string | number> {
  const out: Record<string, string | number> = {};
  for (const [field, value] of Object.entries(event)) {
    out[field] = typeof value === 'bigint' ? value.toString() : value;
  }
  return out;
}
