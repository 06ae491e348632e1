import {
  getHeader,
  isSuccessStatus,
  setHeader,
  type ApiResponse,
  type RequestInterceptor,
  type ResponseInterceptor,
} from '@resilient-api/core';
import type { CacheManager } from './cacheManager';
import {
  DEFAULT_CACHING_POLICY,
  isMethodCacheable,
  isPathCacheable,
  shouldCache,
  type CachingPolicy,
} from './policy';
import type { CacheEntry } from './types';

export const METADATA_CACHE_KEY = 'cache_key';
export const CACHE_STATUS_HEADER = 'X-Cache';

const MUTATING_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

export interface CacheInterceptorOptions {
  /** Per-path TTL; falls back to the policy TTL, then the manager default. */
  ttlFor?: (path: string) => number | undefined;
}

export interface CacheInterceptorPair {
  request: RequestInterceptor;
  response: ResponseInterceptor;
}

function responseFromEntry(entry: CacheEntry, status: string): ApiResponse {
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
    [CACHE_STATUS_HEADER]: status,
  };
  if (entry.etag) headers.ETag = entry.etag;
  return { statusCode: 200, headers, body: entry.data, fromCache: true };
}

/**
 * Request/response pair that serves fresh GET hits without a round trip and
 * stores cacheable responses. A GET already carrying `If-None-Match` is sent
 * to the server for revalidation; a 304 reply is then answered from the
 * stored entry.
 *
 * @example
 * ```typescript
 * const cache = createCacheInterceptor(manager, DEFAULT_CACHING_POLICY);
 * chain
 *   .addRequestInterceptor(cache.request)
 *   .addResponseInterceptor(cache.response);
 * ```
 */
export function createCacheInterceptor(
  manager: CacheManager,
  policy: CachingPolicy = DEFAULT_CACHING_POLICY,
  options: CacheInterceptorOptions = {}
): CacheInterceptorPair {
  const ttlFor = (path: string) => options.ttlFor?.(path) ?? policy.ttlMs;
  const store = (
    key: string,
    data: Uint8Array,
    etag: string | undefined,
    path: string
  ) =>
    etag
      ? manager.setWithEtag(key, data, etag, ttlFor(path))
      : manager.set(key, data, ttlFor(path));

  const request: RequestInterceptor = async (req) => {
    if (!isMethodCacheable(policy, req.method)) return;
    if (!isPathCacheable(policy, req.path)) return;
    const key = manager.getCacheKey(req.method, req.path, req.query);
    req.metadata[METADATA_CACHE_KEY] = key;

    if (req.method !== 'GET') return;
    if (getHeader(req.headers, 'If-None-Match') !== undefined) return;
    const entry = await manager.getEntry(key);
    if (entry) {
      req.cachedResponse = responseFromEntry(entry, 'HIT');
    }
  };

  const response: ResponseInterceptor = async (req, res) => {
    const key = req.metadata[METADATA_CACHE_KEY];
    if (typeof key !== 'string') return;
    if (res.error !== undefined || res.fromCache) return;

    if (res.statusCode === 304) {
      const entry = await manager.getEntry(key);
      if (!entry) return;
      const etag = getHeader(res.headers, 'ETag') ?? entry.etag;
      const served = responseFromEntry({ ...entry, etag }, 'REVALIDATED');
      res.statusCode = served.statusCode;
      res.body = served.body;
      res.fromCache = true;
      for (const [name, value] of Object.entries(served.headers)) {
        setHeader(res.headers, name, value);
      }
      await store(key, entry.data, etag, req.path);
      return;
    }

    if (!shouldCache(policy, req.method, req.path, res.statusCode)) return;
    await store(key, res.body, getHeader(res.headers, 'ETag'), req.path);
  };

  return { request, response };
}

/** Attaches `If-None-Match` to GETs whose cache entry carries an ETag. */
export function createConditionalRequestInterceptor(
  manager: CacheManager
): RequestInterceptor {
  return async (request) => {
    if (request.method !== 'GET') return;
    const key = manager.getCacheKey('GET', request.path, request.query);
    const etag = await manager.getEtag(key);
    if (etag) {
      setHeader(request.headers, 'If-None-Match', etag);
    }
  };
}

/**
 * After a successful POST/PUT/PATCH/DELETE, drops cached entries for the path,
 * everything beneath it and its parent collection.
 */
export function createCacheInvalidationInterceptor(
  manager: CacheManager
): ResponseInterceptor {
  return async (request, response) => {
    if (!MUTATING_METHODS.has(request.method)) return;
    if (response.error !== undefined) return;
    if (!isSuccessStatus(response.statusCode)) return;
    await manager.invalidateResource(request.path);
  };
}
