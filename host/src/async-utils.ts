export class AsyncSemaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly limit: number) {
    if (!Number.isFinite(limit) || limit <= 0) {
      throw new Error(`max concurrent operations must be > 0 (got ${limit})`);
    }
  }

  get pending() {
    return this.waiters.length;
  }

  get inUse() {
    return this.active;
  }

  async acquire(): Promise<() => void> {
    if (this.active >= this.limit) {
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    } else {
      this.active += 1;
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      // Hand the slot straight to the next waiter so a new caller cannot
      // overtake it between release and wake-up.
      const next = this.waiters.shift();
      if (next) {
        next();
      } else {
        this.active = Math.max(0, this.active - 1);
      }
    };
  }
}

/**
 * Mutual exclusion in acquisition (FIFO) order.
 */
export class AsyncMutex {
  private readonly semaphore = new AsyncSemaphore(1);

  get locked() {
    return this.semaphore.inUse > 0;
  }

  acquire(): Promise<() => void> {
    return this.semaphore.acquire();
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }
}
