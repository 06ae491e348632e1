import { CancelledError } from './errors';

interface Waiter {
  resolve: () => void;
  reject: (error: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

/**
 * Token bucket sized to `requestsPerSecond` permits. The bucket starts full
 * and a single permit is added every `1000 / requestsPerSecond` ms, never
 * beyond capacity.
 * Callers waiting for a permit are served in arrival order.
 */
export class TokenBucketRateLimiter {
  readonly capacity: number;
  readonly refillIntervalMs: number;
  private permits: number;
  private readonly waiters: Waiter[] = [];
  private timer?: ReturnType<typeof setInterval>;

  constructor(requestsPerSecond: number) {
    if (!Number.isFinite(requestsPerSecond) || requestsPerSecond <= 0) {
      throw new RangeError(
        `requestsPerSecond must be positive, got ${requestsPerSecond}`
      );
    }
    this.capacity = Math.floor(requestsPerSecond) || 1;
    this.refillIntervalMs = 1000 / this.capacity;
    this.permits = this.capacity;
  }

  get available(): number {
    return this.permits;
  }

  get pending(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError(signal.reason));
    }
    this.ensureTimer();
    if (this.permits > 0 && this.waiters.length === 0) {
      this.permits -= 1;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = this.waiters.indexOf(waiter);
          if (index >= 0) this.waiters.splice(index, 1);
          reject(new CancelledError(signal.reason));
        };
        signal.addEventListener('abort', waiter.onAbort, { once: true });
      }
      this.waiters.push(waiter);
    });
  }

  /** Stops the refill timer; pending waiters are rejected. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    for (const waiter of this.waiters.splice(0)) {
      this.detach(waiter);
      waiter.reject(new CancelledError('rate limiter stopped'));
    }
  }

  private ensureTimer(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.refill(), this.refillIntervalMs);
    this.timer.unref?.();
  }

  private refill(): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      this.detach(waiter);
      waiter.resolve();
      return;
    }
    if (this.permits < this.capacity) {
      this.permits += 1;
    }
  }

  private detach(waiter: Waiter): void {
    if (waiter.signal && waiter.onAbort) {
      waiter.signal.removeEventListener('abort', waiter.onAbort);
    }
  }
}
