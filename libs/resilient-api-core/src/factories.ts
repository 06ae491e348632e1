import { OAuth2TokenManager } from './auth/OAuth2TokenManager';
import { CircuitBreaker } from './circuitBreaker';
import {
  parseApiClientConfig,
  type ApiClientConfig,
  type ApiClientConfigInput,
} from './config';
import { ApiHttpClient } from './HttpClient';
import { InterceptorChain } from './interceptorChain';
import {
  createAuthInterceptor,
  createCircuitBreakerRequestInterceptor,
  createCircuitBreakerResponseInterceptor,
  createLoggingRequestInterceptor,
  createLoggingResponseInterceptor,
  createMetricsRequestInterceptor,
  createMetricsResponseInterceptor,
  createRateLimitInterceptor,
  createRetryResponseInterceptor,
} from './interceptors';
import { createPinoLogger } from './logging';
import { MetricsCollector } from './metrics';
import { TokenBucketRateLimiter } from './rateLimiter';
import type { Clock, HttpTransport, Logger } from './types';

export interface ApiClientOptions {
  transport?: HttpTransport;
  /**
   * Defaults to a pino logger at `debug` when the config enables it, `info`
   * otherwise.
   */
  logger?: Logger;
  clock?: Clock;
}

export interface ApiClient {
  readonly config: ApiClientConfig;
  readonly http: ApiHttpClient;
  readonly chain: InterceptorChain;
  readonly tokenManager: OAuth2TokenManager;
  readonly metrics: MetricsCollector;
  readonly circuitBreaker: CircuitBreaker;
  readonly rateLimiter?: TokenBucketRateLimiter;
  readonly logger: Logger;
  /** Releases the rate limiter's refill timer and rejects its waiters. */
  close(): void;
}

/**
 * Creates a fully wired client. Request interceptors run as logging, circuit
 * breaker, auth, rate limit, metrics; response interceptors as logging,
 * metrics, circuit breaker, retry flag.
 *
 * @example
 * ```typescript
 * const api = createApiClient({
 *   apiEndpoint: 'https://api.example.com',
 *   clientId: 'deployer',
 *   clientSecret: process.env.API_CLIENT_SECRET,
 * });
 * const response = await api.http.get('/v3/apps', { per_page: 50 });
 * ```
 */
export function createApiClient(
  input: ApiClientConfigInput,
  options: ApiClientOptions = {}
): ApiClient {
  const config = parseApiClientConfig(input);
  const clock = options.clock ?? Date.now;
  const logger =
    options.logger ??
    createPinoLogger({
      level: config.debug ? 'debug' : 'info',
      name: 'resilient-api',
    });

  const tokenManager = new OAuth2TokenManager(
    {
      apiEndpoint: config.apiEndpoint,
      tokenUrl: config.tokenUrl,
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      username: config.username,
      password: config.password,
      refreshToken: config.refreshToken,
      accessToken: config.accessToken,
      scopes: config.scopes,
    },
    { transport: options.transport, logger, clock }
  );

  const metrics = new MetricsCollector(clock);
  const circuitBreaker = new CircuitBreaker(config.circuitBreaker, clock);
  const rateLimiter = config.rateLimit
    ? new TokenBucketRateLimiter(config.rateLimit.requestsPerSecond)
    : undefined;

  // An open breaker rejects before any token exchange or rate-limit permit.
  const chain = new InterceptorChain()
    .addRequestInterceptor(createLoggingRequestInterceptor(logger))
    .addRequestInterceptor(
      createCircuitBreakerRequestInterceptor(circuitBreaker)
    )
    .addRequestInterceptor(
      createAuthInterceptor({
        getToken: (signal) => tokenManager.getToken(signal),
      })
    );
  if (rateLimiter) {
    chain.addRequestInterceptor(createRateLimitInterceptor(rateLimiter));
  }
  chain
    .addRequestInterceptor(createMetricsRequestInterceptor(clock))
    .addResponseInterceptor(createLoggingResponseInterceptor(logger))
    .addResponseInterceptor(createMetricsResponseInterceptor(metrics, clock))
    .addResponseInterceptor(
      createCircuitBreakerResponseInterceptor(circuitBreaker)
    )
    .addResponseInterceptor(createRetryResponseInterceptor(config.retry));

  const http = new ApiHttpClient({
    baseUrl: config.apiEndpoint,
    transport: options.transport,
    chain,
    retry: config.retry,
    timeoutMs: config.timeoutMs,
    userAgent: config.userAgent,
    logger,
    tokenManager,
    clock,
  });

  return {
    config,
    http,
    chain,
    tokenManager,
    metrics,
    circuitBreaker,
    rateLimiter,
    logger,
    close: () => rateLimiter?.stop(),
  };
}
