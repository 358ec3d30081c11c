/**
 * Counting semaphore for bounding concurrent outbound calls.
 * Waiters are served in FIFO order; a waiter whose signal aborts leaves the queue.
 */

import { CancelledError } from '../errors.js';

interface Waiter {
  resolve: (release: () => void) => void;
  reject: (err: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export class Semaphore {
  private available: number;
  private readonly waiters: Waiter[] = [];

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
    }
    this.available = permits;
  }

  /** Permits currently free. */
  get free(): number {
    return this.available;
  }

  /** Callers currently blocked in acquire(). */
  get pending(): number {
    return this.waiters.length;
  }

  /** Resolves with a release function once a permit is held. */
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) return Promise.reject(new CancelledError());

    if (this.available > 0) {
      this.available--;
      return Promise.resolve(this.releaser());
    }

    return new Promise((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          reject(new CancelledError());
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  /** Runs `task` while holding a permit. */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  // ── Private ──

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.handOff();
    };
  }

  private handOff(): void {
    const next = this.waiters.shift();
    if (!next) {
      this.available++;
      return;
    }
    if (next.signal && next.onAbort) {
      next.signal.removeEventListener('abort', next.onAbort);
    }
    next.resolve(this.releaser());
  }
}
