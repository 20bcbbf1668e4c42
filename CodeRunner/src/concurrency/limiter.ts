/**
 * Counting admission gate with a bounded FIFO wait queue.
 *
 * A released slot is handed straight to the oldest waiter, so a newcomer can
 * never take a slot ahead of someone already queued.
 */

import { OverloadedError } from '../executor/errors.js';

export interface LimiterOptions {
  maxConcurrent: number;
  /** Waiters allowed beyond the active slots. 0 rejects as soon as all slots are busy. */
  maxQueue: number;
  /** Longest a caller waits for a slot before giving up. */
  queueTimeoutMs: number;
}

export interface LimiterStats {
  active: number;
  queued: number;
  maxConcurrent: number;
  maxQueue: number;
}

/** Gives the slot back. Calling it more than once has no further effect. */
export type Release = () => void;

interface Waiter {
  grant: (release: Release) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly options: LimiterOptions) {
    if (!Number.isInteger(options.maxConcurrent) || options.maxConcurrent < 1) {
      throw new RangeError('maxConcurrent must be a positive integer');
    }
    if (!Number.isInteger(options.maxQueue) || options.maxQueue < 0) {
      throw new RangeError('maxQueue must be a non-negative integer');
    }
  }

  /**
   * Wait for a slot.
   *
   * @param waitMs - overrides the configured queue timeout for this call
   * @throws OverloadedError when the queue is full or the wait expires
   */
  acquire(waitMs: number = this.options.queueTimeoutMs): Promise<Release> {
    if (this.active < this.options.maxConcurrent && this.waiters.length === 0) {
      this.active++;
      return Promise.resolve(this.createRelease());
    }

    if (this.waiters.length >= this.options.maxQueue) {
      return Promise.reject(new OverloadedError(
        `All ${this.options.maxConcurrent} execution slots are busy and the queue is full`,
      ));
    }

    return new Promise<Release>((resolve, reject) => {
      const waiter: Waiter = {
        grant: resolve,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) this.waiters.splice(index, 1);
          reject(new OverloadedError(`No execution slot became free within ${waitMs}ms`));
        }, waitMs),
      };
      this.waiters.push(waiter);
    });
  }

  /**
   * Run `task` inside a slot. The slot is released however `task` settles.
   */
  async run<T>(task: () => Promise<T>, waitMs?: number): Promise<T> {
    const release = await this.acquire(waitMs);
    try {
      return await task();
    } finally {
      release();
    }
  }

  stats(): LimiterStats {
    return {
      active: this.active,
      queued: this.waiters.length,
      maxConcurrent: this.options.maxConcurrent,
      maxQueue: this.options.maxQueue,
    };
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;

      const next = this.waiters.shift();
      if (next) {
        // Slot passes to the next waiter; the active count stays the same
        clearTimeout(next.timer);
        next.grant(this.createRelease());
      } else {
        this.active--;
      }
    };
  }
}
