export * from './types';
export * from './errors';
export * from './logging';
export * from './request';
export * from './config';
export { InterceptorChain } from './interceptorChain';
export * from './interceptors';
export * from './circuitBreaker';
export * from './rateLimiter';
export * from './metrics';
export * from './auth/token';
export * from './auth/grants';
export * from './auth/OAuth2TokenManager';
export * from './auth/PersistingTokenManager';
export * from './auth/uaa';
export {
  ApiHttpClient,
  DEFAULT_TIMEOUT_MS,
  parseRetryAfter,
} from './HttpClient';
export type { ApiHttpClientConfig, JsonRequestInit } from './HttpClient';
export { createApiClient } from './factories';
export type { ApiClient, ApiClientOptions } from './factories';
export * from './transport/fetchTransport';
