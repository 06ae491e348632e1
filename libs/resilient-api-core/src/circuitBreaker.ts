import { CircuitOpenError } from './errors';
import type { CircuitBreakerConfig, Clock } from './types';

export type CircuitState = 'closed' | 'open' | 'half-open';

export const DEFAULT_CIRCUIT_BREAKER_CONFIG: Readonly<CircuitBreakerConfig> =
  Object.freeze({
    threshold: 5,
    timeoutMs: 30_000,
    successThreshold: 2,
  });

export interface CircuitBreakerSnapshot {
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailureAt?: number;
}

export type CircuitStateListener = (
  from: CircuitState,
  to: CircuitState
) => void;

/**
 * Failure-count state machine guarding one endpoint group.
 *
 * All state lives in this instance and every transition runs synchronously,
 * so concurrent requests in flight observe and update it one at a time on the
 * event loop.
 */
export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;
  private readonly now: Clock;
  private state: CircuitState = 'closed';
  private failures = 0;
  private successes = 0;
  private lastFailureAt?: number;
  private readonly listeners: CircuitStateListener[] = [];

  constructor(
    config: Partial<CircuitBreakerConfig> = {},
    clock: Clock = Date.now
  ) {
    this.config = { ...DEFAULT_CIRCUIT_BREAKER_CONFIG, ...config };
    this.now = clock;
  }

  getState(): CircuitState {
    return this.state;
  }

  snapshot(): CircuitBreakerSnapshot {
    return {
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailureAt: this.lastFailureAt,
    };
  }

  onStateChange(listener: CircuitStateListener): void {
    this.listeners.push(listener);
  }

  /**
   * Throws {@link CircuitOpenError} while open. Once the open duration has
   * elapsed since the last failure, moves to half-open and lets the request
   * through.
   */
  allowRequest(): void {
    if (this.state !== 'open') return;

    const elapsed = this.now() - (this.lastFailureAt ?? 0);
    if (elapsed > this.config.timeoutMs) {
      this.transition('half-open');
      this.successes = 0;
      return;
    }
    throw new CircuitOpenError(this.config.timeoutMs - elapsed);
  }

  recordFailure(): void {
    this.failures += 1;
    this.lastFailureAt = this.now();

    if (this.failures >= this.config.threshold) {
      this.transition('open');
    }
    if (this.state === 'half-open') {
      this.transition('open');
    }
  }

  recordSuccess(): void {
    switch (this.state) {
      case 'half-open':
        this.successes += 1;
        if (this.successes >= this.config.successThreshold) {
          this.transition('closed');
          this.failures = 0;
        }
        break;
      case 'closed':
        this.failures = 0;
        break;
      default:
        break;
    }
  }

  private transition(next: CircuitState): void {
    if (next === this.state) return;
    const previous = this.state;
    this.state = next;
    for (const listener of this.listeners) {
      listener(previous, next);
    }
  }
}
