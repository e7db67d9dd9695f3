import { AsyncLocalStorage } from 'async_hooks';
import { MarketplaceError } from '../errors';

interface HeldLock {
  operation: string;
  // Async work started inside the call keeps this record after release
  active: boolean;
}

/**
 * Exclusive lock around every state-mutating marketplace call.
 *
 * Independent callers queue in arrival order, so at most one mutation is in
 * flight. A call issued from inside the in-flight call's async context
 * (a payee hook, a registry callback) is rejected instead of queued. Work
 * that context schedules to run after the call has returned queues normally.
 */
export class ReentrancyGuard {
  private readonly held = new AsyncLocalStorage<HeldLock>();
  private tail: Promise<void> = Promise.resolve();

  get locked(): boolean {
    return this.held.getStore()?.active === true;
  }

  async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    const current = this.held.getStore();
    if (current?.active) {
      throw new MarketplaceError('ReentrantCall', {
        operation,
        inFlight: current.operation,
      });
    }

    let release: () => void = () => undefined;
    const turn = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => turn);

    await previous;
    const lock: HeldLock = { operation, active: true };
    try {
      return await this.held.run(lock, work);
    } finally {
      lock.active = false;
      release();
    }
  }
}
