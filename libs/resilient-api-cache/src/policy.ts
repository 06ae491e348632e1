import { isSuccessStatus } from '@resilient-api/core';
import { DEFAULT_CACHE_TTL_MS } from './cacheManager';

export interface CachingPolicy {
  cacheGet: boolean;
  cachePost: boolean;
  /** Also cache non-2xx responses. */
  cacheErrors: boolean;
  /** When non-empty, only these paths and paths beneath them are cached. */
  includePaths?: readonly string[];
  /** Never cached, even when included. */
  excludePaths?: readonly string[];
  ttlMs?: number;
}

export const DEFAULT_CACHING_POLICY: Readonly<CachingPolicy> = Object.freeze({
  cacheGet: true,
  cachePost: false,
  cacheErrors: false,
  excludePaths: Object.freeze(['/v3/jobs', '/v3/deployments']),
  ttlMs: DEFAULT_CACHE_TTL_MS,
});

export function pathMatches(path: string, prefix: string): boolean {
  const base = prefix.replace(/\/+$/, '');
  return path === base || path.startsWith(`${base}/`);
}

export function isMethodCacheable(
  policy: CachingPolicy,
  method: string
): boolean {
  if (method === 'GET') return policy.cacheGet;
  if (method === 'POST') return policy.cachePost;
  return false;
}

export function isPathCacheable(policy: CachingPolicy, path: string): boolean {
  const excluded = policy.excludePaths ?? [];
  if (excluded.some((prefix) => pathMatches(path, prefix))) return false;
  if (policy.includePaths && policy.includePaths.length > 0) {
    return policy.includePaths.some((prefix) => pathMatches(path, prefix));
  }
  return true;
}

export function shouldCache(
  policy: CachingPolicy,
  method: string,
  path: string,
  statusCode: number
): boolean {
  if (!isMethodCacheable(policy, method)) return false;
  if (!isPathCacheable(policy, path)) return false;
  return policy.cacheErrors ? statusCode > 0 : isSuccessStatus(statusCode);
}
