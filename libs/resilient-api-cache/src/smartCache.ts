import {
  noopLogger,
  type InterceptorChain,
  type Logger,
  type ResponseInterceptor,
} from '@resilient-api/core';
import type { CacheManager } from './cacheManager';
import {
  createCacheInterceptor,
  createCacheInvalidationInterceptor,
  createConditionalRequestInterceptor,
} from './interceptors';
import {
  DEFAULT_CACHING_POLICY,
  pathMatches,
  type CachingPolicy,
} from './policy';

export interface SmartCacheConfig {
  enableSmartInvalidation: boolean;
  enableConditionalRequests: boolean;
  /** Log the manager's counters after each cached-path response. */
  enableMetrics: boolean;
  /** TTL per resource path prefix; the longest matching prefix wins. */
  resourceTtls: Readonly<Record<string, number>>;
  policy: CachingPolicy;
}

export const DEFAULT_SMART_CACHE_CONFIG: Readonly<SmartCacheConfig> =
  Object.freeze({
    enableSmartInvalidation: true,
    enableConditionalRequests: true,
    enableMetrics: true,
    resourceTtls: Object.freeze({
      '/v3/organizations': 10 * 60_000,
      '/v3/spaces': 5 * 60_000,
      '/v3/apps': 2 * 60_000,
      '/v3/tasks': 30_000,
    }),
    policy: DEFAULT_CACHING_POLICY,
  });

export function resolveResourceTtl(
  resourceTtls: Readonly<Record<string, number>>,
  path: string
): number | undefined {
  let best: { prefix: string; ttlMs: number } | undefined;
  for (const [prefix, ttlMs] of Object.entries(resourceTtls)) {
    if (!pathMatches(path, prefix)) continue;
    if (!best || prefix.length > best.prefix.length) {
      best = { prefix, ttlMs };
    }
  }
  return best?.ttlMs;
}

export function createCacheStatsInterceptor(
  manager: CacheManager,
  logger: Logger
): ResponseInterceptor {
  return (request) => {
    if (request.method !== 'GET') return;
    const stats = manager.getStats();
    logger.debug('cache.stats', {
      hits: stats.hits,
      misses: stats.misses,
      sets: stats.sets,
      hitRate: stats.getHitRate(),
    });
  };
}

/**
 * Appends the caching interceptors to `chain`: cache lookup, conditional
 * requests, invalidation on mutation, cache population and stats logging, each
 * as enabled by `config`.
 */
export function configureSmartCache(
  chain: InterceptorChain,
  manager: CacheManager,
  config: SmartCacheConfig = DEFAULT_SMART_CACHE_CONFIG,
  logger: Logger = noopLogger
): void {
  const cache = createCacheInterceptor(manager, config.policy, {
    ttlFor: (path) => resolveResourceTtl(config.resourceTtls, path),
  });

  // A fresh hit ends the request phase; If-None-Match only follows a miss.
  chain.addRequestInterceptor(cache.request);
  if (config.enableConditionalRequests) {
    chain.addRequestInterceptor(createConditionalRequestInterceptor(manager));
  }

  if (config.enableSmartInvalidation) {
    chain.addResponseInterceptor(createCacheInvalidationInterceptor(manager));
  }
  chain.addResponseInterceptor(cache.response);
  if (config.enableMetrics) {
    chain.addResponseInterceptor(createCacheStatsInterceptor(manager, logger));
  }
}
