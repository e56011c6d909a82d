// src/utils/Semaphore.ts

/**
 * Counting semaphore bounding how many async tasks run at once.
 * Waiters are released in FIFO order.
 */
export class Semaphore {
  private available: number;
  private waiters: Array<() => void> = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Hand the slot straight to the next waiter
      next();
    } else {
      this.available = Math.min(this.available + 1, this.capacity);
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}

/**
 * Run `worker` over every item with at most `concurrency` in flight and wait
 * for all of them, successful or not. Settled results keep input order.
 */
export async function mapSettled<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  const semaphore = new Semaphore(Math.max(1, Math.min(Math.floor(concurrency), items.length || 1)));
  return Promise.allSettled(items.map((item, index) => semaphore.run(() => worker(item, index))));
}
