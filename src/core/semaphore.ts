/**
 * Counting semaphore
 *
 * Bounds how many turns run at once. acquire() takes a permit and waits when
 * none is free; release() hands the permit to the oldest waiter.
 */

import { createChildLogger } from './logger.js';

const log = createChildLogger('Semaphore');

export class Semaphore {
  private permits: number;
  private readonly waiters: Array<() => void> = [];

  constructor(maxPermits: number) {
    if (maxPermits < 1) {
      throw new Error(`Semaphore maxPermits must be >= 1, got ${maxPermits}`);
    }
    this.permits = maxPermits;
  }

  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    log.debug({ available: this.permits, waiting: this.waiters.length }, 'waiting for a permit');

    return new Promise<void>((resolve) => {
      this.waiters.push(() => {
        this.permits--;
        resolve();
      });
    });
  }

  /** Release a permit; wakes the first waiter (FIFO) */
  release(): void {
    this.permits++;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter();
    }
  }

  /** Run fn while holding a permit */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get available(): number {
    return this.permits;
  }
}
