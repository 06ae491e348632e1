/** Counting semaphore; waiters are admitted in arrival order. */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits <= 0) {
      throw new RangeError(
        `permits must be a positive integer, got ${permits}`
      );
    }
    this.available = permits;
  }

  get inUse(): number {
    return this.permits - this.available;
  }

  acquire(): Promise<void> {
    if (this.available > 0) {
      this.available -= 1;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // The permit passes straight to the next waiter.
      next();
      return;
    }
    this.available = Math.min(this.available + 1, this.permits);
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
