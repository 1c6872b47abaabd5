/**
 * Concurrency limits for repository work
 *
 * Usage:
 *   const sem = new Semaphore(5);
 *   await sem.acquire();
 *   try {
 *     await cloneOne();
 *   } finally {
 *     sem.release();
 *   }
 *
 *   // Or let the helper manage permits
 *   const results = await mapWithConcurrency(tasks, 5, (task) => syncer.clone(task));
 */

import { createValidationError } from '../core/errors.js';

/**
 * Semaphore for limiting concurrent operations
 */
export class Semaphore {
  private permits: number;
  private readonly maxPermits: number;
  private waitQueue: Array<() => void> = [];

  constructor(maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw createValidationError('maxConcurrent', `must be a positive integer, got ${maxConcurrent}`);
    }
    this.maxPermits = maxConcurrent;
    this.permits = maxConcurrent;
  }

  /**
   * Acquire a permit, waiting if necessary
   */
  async acquire(): Promise<void> {
    if (this.permits > 0) {
      this.permits--;
      return;
    }

    return new Promise((resolve) => {
      this.waitQueue.push(resolve);
    });
  }

  /**
   * Release a permit; a waiter, if any, takes it over directly
   */
  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      next();
    } else if (this.permits < this.maxPermits) {
      this.permits++;
    }
  }

  available(): number {
    return this.permits;
  }
}

/**
 * Run `worker` over `items` with at most `limit` in flight.
 * Results keep the order of `items`. A rejecting worker rejects the whole call
 * once everything already started has settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const semaphore = new Semaphore(limit);

  const settled = await Promise.allSettled(
    items.map(async (item, index) => {
      await semaphore.acquire();
      try {
        return await worker(item, index);
      } finally {
        semaphore.release();
      }
    })
  );

  const results: R[] = [];
  for (const outcome of settled) {
    if (outcome.status === 'rejected') {
      throw outcome.reason;
    }
    results.push(outcome.value);
  }
  return results;
}
