import type { Clock } from './types';

export interface EndpointMetrics {
  totalRequests: number;
  totalErrors: number;
  totalLatencyMs: number;
  averageLatencyMs: number;
  lastRequestTime?: number;
}

export type MetricsObserver = (
  endpoint: string,
  metrics: Readonly<EndpointMetrics>
) => void;

/**
 * Per-endpoint aggregates keyed by `"METHOD PATH"`.
 *
 * Updates are applied synchronously and observers run inline, right after the
 * update that triggered them, on the caller's turn of the event loop.
 */
export class MetricsCollector {
  private readonly metrics = new Map<string, EndpointMetrics>();
  private readonly observers: MetricsObserver[] = [];

  constructor(private readonly now: Clock = Date.now) {}

  /** Registers an observer; returns a function that removes it. */
  onChange(observer: MetricsObserver): () => void {
    this.observers.push(observer);
    return () => {
      const index = this.observers.indexOf(observer);
      if (index >= 0) this.observers.splice(index, 1);
    };
  }

  getMetrics(endpoint: string): EndpointMetrics | undefined {
    const current = this.metrics.get(endpoint);
    return current ? { ...current } : undefined;
  }

  getAllMetrics(): Record<string, EndpointMetrics> {
    const result: Record<string, EndpointMetrics> = {};
    for (const [endpoint, value] of this.metrics) {
      result[endpoint] = { ...value };
    }
    return result;
  }

  record(endpoint: string, latencyMs: number, isError: boolean): void {
    const current = this.metrics.get(endpoint) ?? {
      totalRequests: 0,
      totalErrors: 0,
      totalLatencyMs: 0,
      averageLatencyMs: 0,
    };
    const totalRequests = current.totalRequests + 1;
    const totalLatencyMs = current.totalLatencyMs + latencyMs;
    const next: EndpointMetrics = {
      totalRequests,
      totalErrors: current.totalErrors + (isError ? 1 : 0),
      totalLatencyMs,
      averageLatencyMs: totalLatencyMs / totalRequests,
      lastRequestTime: this.now(),
    };
    this.metrics.set(endpoint, next);

    for (const observer of this.observers) {
      observer(endpoint, { ...next });
    }
  }

  reset(): void {
    this.metrics.clear();
  }
}
