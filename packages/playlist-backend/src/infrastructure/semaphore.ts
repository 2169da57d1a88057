// packages/playlist-backend/src/infrastructure/semaphore.ts
// In-process counting semaphore with FIFO waiters.
// - Bounds concurrent pipeline runs (worker pool) and concurrent track searches.
// - Waiters are served strictly in arrival order.

export interface SemaphoreStats {
  active: number;
  queued: number;
  max: number;
}

export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error(`Semaphore size must be a positive integer (got ${maxConcurrent})`);
    }
  }

  /**
   * Acquire a slot. Resolves immediately when one is free, otherwise once every
   * earlier waiter has been served.
   */
  acquire(): Promise<void> {
    if (this.active < this.maxConcurrent && this.waiters.length === 0) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // Slot passes straight to the next waiter; `active` is unchanged.
      next();
      return;
    }
    if (this.active === 0) {
      throw new Error('Semaphore released more times than acquired');
    }
    this.active -= 1;
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  getStats(): SemaphoreStats {
    return { active: this.active, queued: this.waiters.length, max: this.maxConcurrent };
  }
}

/** Maps `items` through `fn` with at most `limit` calls in flight; output keeps input order. */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const semaphore = new Semaphore(Math.max(1, limit));
  return Promise.all(items.map((item, index) => semaphore.run(() => fn(item, index))));
}
