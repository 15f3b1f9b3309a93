/**
 * Counting semaphore for bounding concurrent requests.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
    this.available = limit;
  }

  /** Permits not currently held. */
  get free(): number {
    return this.available;
  }

  /** Callers waiting for a permit. */
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
      // permit passes straight to the next waiter
      next();
    } else {
      this.available = Math.min(this.available + 1, this.limit);
    }
  }

  /**
   * Run a task while holding a permit.
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
