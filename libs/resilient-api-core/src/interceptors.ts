import { CircuitBreaker } from './circuitBreaker';
import { errorMessage } from './errors';
import { MetricsCollector } from './metrics';
import { TokenBucketRateLimiter } from './rateLimiter';
import { setHeader } from './request';
import type {
  Clock,
  Logger,
  RequestInterceptor,
  ResponseInterceptor,
  RetryConfig,
} from './types';

export const RETRY_HEADER = 'X-Should-Retry';
export const METADATA_START_TIME = 'start_time';
export const METADATA_DEADLINE = 'deadline';

export const DEFAULT_RETRY_CONFIG: RetryConfig = Object.freeze({
  maxRetries: 3,
  retryDelayMs: 1_000,
  maxDelayMs: 30_000,
  retryOnCodes: Object.freeze([429, 500, 502, 503, 504]),
});

// ============================================================================
// Logging
// ============================================================================

export function createLoggingRequestInterceptor(
  logger: Logger
): RequestInterceptor {
  return (request) => {
    logger.debug('API Request', { method: request.method, path: request.path });
  };
}

export function createLoggingResponseInterceptor(
  logger: Logger
): ResponseInterceptor {
  return (request, response) => {
    if (response.error !== undefined || response.statusCode >= 400) {
      logger.error('API Response Error', {
        method: request.method,
        path: request.path,
        status: response.statusCode,
        error:
          response.error === undefined
            ? undefined
            : errorMessage(response.error),
      });
      return;
    }
    logger.debug('API Response', {
      method: request.method,
      path: request.path,
      status: response.statusCode,
    });
  };
}

// ============================================================================
// Headers and authentication
// ============================================================================

export function createHeaderInterceptor(
  headers: Record<string, string>
): RequestInterceptor {
  const entries = Object.entries(headers);
  return (request) => {
    for (const [name, value] of entries) {
      setHeader(request.headers, name, value);
    }
  };
}

export interface AuthInterceptorOptions {
  getToken: (signal?: AbortSignal) => Promise<string> | string;
  headerName?: string; // default: "Authorization"
  formatToken?: (token: string) => string; // default: (t) => `Bearer ${t}`
}

/**
 * Adds an authorization header to each request. A failing `getToken` fails the
 * request phase; the request is never sent without the header.
 *
 * @example
 * ```typescript
 * chain.addRequestInterceptor(
 *   createAuthInterceptor({
 *     getToken: (signal) => tokenManager.getToken(signal),
 *   })
 * );
 * ```
 */
export function createAuthInterceptor(
  opts: AuthInterceptorOptions
): RequestInterceptor {
  const headerName = opts.headerName ?? 'Authorization';
  const formatToken = opts.formatToken ?? ((t: string) => `Bearer ${t}`);

  return async (request) => {
    const token = await opts.getToken(request.signal);
    setHeader(request.headers, headerName, formatToken(token));
  };
}

// ============================================================================
// Rate limiting
// ============================================================================

/**
 * Blocks each request until a permit is available or the request's signal
 * aborts. Passing a number creates a dedicated {@link TokenBucketRateLimiter}.
 */
export function createRateLimitInterceptor(
  limiter: TokenBucketRateLimiter | number
): RequestInterceptor {
  const bucket =
    typeof limiter === 'number' ? new TokenBucketRateLimiter(limiter) : limiter;
  return (request) => bucket.acquire(request.signal);
}

// ============================================================================
// Retry classification
// ============================================================================

/**
 * Marks responses whose status is in `retryOnCodes` with
 * `X-Should-Retry: true`. The executor owns the retry loop; this interceptor
 * only classifies.
 */
export function createRetryResponseInterceptor(
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): ResponseInterceptor {
  const codes = new Set(config.retryOnCodes);
  return (_request, response) => {
    if (!codes.has(response.statusCode)) return;
    setHeader(response.headers, RETRY_HEADER, 'true');
  };
}

// ============================================================================
// Timeout
// ============================================================================

/**
 * Stamps an absolute deadline into request metadata; the executor aborts the
 * attempt at that instant.
 */
export function createTimeoutInterceptor(
  timeoutMs: number,
  clock: Clock = Date.now
): RequestInterceptor {
  return (request) => {
    const deadline = clock() + timeoutMs;
    const existing = request.metadata[METADATA_DEADLINE];
    request.metadata[METADATA_DEADLINE] =
      typeof existing === 'number' ? Math.min(existing, deadline) : deadline;
  };
}

// ============================================================================
// Metrics
// ============================================================================

export const metricsKey = (method: string, path: string): string =>
  `${method} ${path}`;

export function createMetricsRequestInterceptor(
  clock: Clock = Date.now
): RequestInterceptor {
  return (request) => {
    request.metadata[METADATA_START_TIME] = clock();
  };
}

export function createMetricsResponseInterceptor(
  collector: MetricsCollector,
  clock: Clock = Date.now
): ResponseInterceptor {
  return (request, response) => {
    const startedAt = request.metadata[METADATA_START_TIME];
    const latencyMs =
      typeof startedAt === 'number' ? Math.max(0, clock() - startedAt) : 0;
    const isError =
      response.error !== undefined || response.statusCode >= 400;
    collector.record(
      metricsKey(request.method, request.path),
      latencyMs,
      isError
    );
  };
}

// ============================================================================
// Circuit breaker
// ============================================================================

export function createCircuitBreakerRequestInterceptor(
  breaker: CircuitBreaker
): RequestInterceptor {
  return () => {
    breaker.allowRequest();
  };
}

export function createCircuitBreakerResponseInterceptor(
  breaker: CircuitBreaker
): ResponseInterceptor {
  return (_request, response) => {
    if (response.error !== undefined || response.statusCode >= 500) {
      breaker.recordFailure();
    } else {
      breaker.recordSuccess();
    }
  };
}
