import {
  ErrorKind,
  CacheError,
  encodeQuery,
  errorMessage,
  noopLogger,
  type Clock,
  type Logger,
  type QueryParams,
} from '@resilient-api/core';
import type { CacheBackend, CacheEntry } from './types';

export const DEFAULT_CACHE_TTL_MS = 5 * 60_000;

// Index size that triggers the first sweep against the backend.
const INDEX_PRUNE_MIN = 64;

export interface CacheManagerOptions {
  defaultTtlMs?: number;
  /** Store response ETags so GETs can be revalidated with `If-None-Match`. */
  enableEtags?: boolean;
  logger?: Logger;
  clock?: Clock;
}

/** Counters for one manager; they only ever grow. */
export class CacheStats {
  constructor(
    readonly hits = 0,
    readonly misses = 0,
    readonly sets = 0
  ) {}

  getHitRate(): number {
    const total = this.hits + this.misses;
    return total === 0 ? 0 : this.hits / total;
  }
}

/** `METHOD:PATH[:params]` → PATH */
export function pathOfCacheKey(key: string): string {
  const methodEnd = key.indexOf(':');
  if (methodEnd < 0) return key;
  const rest = key.slice(methodEnd + 1);
  const paramsStart = rest.indexOf(':');
  return paramsStart < 0 ? rest : rest.slice(0, paramsStart);
}

/**
 * Typed facade over a {@link CacheBackend}: derives keys, applies TTLs, tracks
 * hit/miss/set counters and keeps an index of written keys for invalidation.
 */
export class CacheManager {
  readonly defaultTtlMs: number;
  readonly enableEtags: boolean;
  private readonly logger: Logger;
  private readonly now: Clock;
  private readonly keys = new Set<string>();
  private pruneAt = INDEX_PRUNE_MIN;
  private hits = 0;
  private misses = 0;
  private sets = 0;

  constructor(
    private readonly backend: CacheBackend,
    options: CacheManagerOptions = {}
  ) {
    this.defaultTtlMs = options.defaultTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.enableEtags = options.enableEtags ?? true;
    this.logger = options.logger ?? noopLogger;
    this.now = options.clock ?? Date.now;
  }

  getCacheKey(method: string, path: string, params?: QueryParams): string {
    const encoded = encodeQuery(params);
    return encoded ? `${method}:${path}:${encoded}` : `${method}:${path}`;
  }

  async set(key: string, data: Uint8Array, ttlMs?: number): Promise<void> {
    await this.store(key, { data, expiresAt: this.expiry(ttlMs) });
  }

  async setWithEtag(
    key: string,
    data: Uint8Array,
    etag: string,
    ttlMs?: number
  ): Promise<void> {
    await this.store(key, {
      data,
      expiresAt: this.expiry(ttlMs),
      etag: this.enableEtags ? etag : undefined,
    });
  }

  /** Payload bytes for `key`; rejects with the backend's miss error. */
  async get(key: string): Promise<Uint8Array> {
    try {
      const entry = await this.backend.get(key);
      this.hits += 1;
      this.logger.debug('cache.hit', { key });
      return entry.data;
    } catch (error) {
      this.recordMiss(key, error);
      throw error;
    }
  }

  /** Like {@link get} but resolves `undefined` on a miss. */
  async getEntry(key: string): Promise<CacheEntry | undefined> {
    try {
      const entry = await this.backend.get(key);
      this.hits += 1;
      this.logger.debug('cache.hit', { key });
      return entry;
    } catch (error) {
      this.recordMiss(key, error);
      return undefined;
    }
  }

  /** Reads an entry without touching the counters. */
  async peek(key: string): Promise<CacheEntry | undefined> {
    try {
      return await this.backend.get(key);
    } catch (error) {
      if (isMiss(error)) return undefined;
      throw error;
    }
  }

  async getEtag(key: string): Promise<string | undefined> {
    if (!this.enableEtags) return undefined;
    return (await this.peek(key))?.etag;
  }

  async delete(key: string): Promise<void> {
    this.keys.delete(key);
    await this.backend.delete(key);
  }

  async clear(): Promise<void> {
    this.keys.clear();
    await this.backend.clear();
  }

  /**
   * Deletes keys whose path equals `path` or lies beneath it; returns the
   * deleted keys.
   */
  invalidatePrefix(path: string): Promise<string[]> {
    const base = path.replace(/\/+$/, '');
    return this.invalidateWhere(
      (keyPath) => keyPath === base || keyPath.startsWith(`${base}/`)
    );
  }

  /** Deletes keys whose path is exactly `path`; returns the deleted keys. */
  invalidatePath(path: string): Promise<string[]> {
    const base = path.replace(/\/+$/, '');
    return this.invalidateWhere((keyPath) => keyPath === base);
  }

  /**
   * Invalidation after a successful mutation of `path`: the resource itself,
   * any sub-resource below it and the parent collection listing.
   */
  async invalidateResource(path: string): Promise<string[]> {
    const base = path.replace(/\/+$/, '');
    const deleted = await this.invalidatePrefix(base);
    const parent = base.slice(0, base.lastIndexOf('/'));
    if (parent) {
      deleted.push(...(await this.invalidatePath(parent)));
    }
    return deleted;
  }

  getStats(): CacheStats {
    return new CacheStats(this.hits, this.misses, this.sets);
  }

  /** Number of keys tracked for invalidation. */
  get indexSize(): number {
    return this.keys.size;
  }

  /**
   * Drops index entries the backend no longer holds (evicted or expired);
   * returns how many were dropped.
   */
  async pruneIndex(): Promise<number> {
    let dropped = 0;
    for (const key of [...this.keys]) {
      if (!(await this.backend.has(key))) {
        this.keys.delete(key);
        dropped += 1;
      }
    }
    this.pruneAt = Math.max(INDEX_PRUNE_MIN, this.keys.size * 2);
    return dropped;
  }

  private async store(key: string, entry: CacheEntry): Promise<void> {
    await this.backend.set(key, entry);
    this.keys.add(key);
    this.sets += 1;
    // The backend evicts on its own; sweep once the index doubles.
    if (this.keys.size > this.pruneAt) {
      await this.pruneIndex();
    }
  }

  private expiry(ttlMs?: number): Date {
    return new Date(this.now() + (ttlMs ?? this.defaultTtlMs));
  }

  private recordMiss(key: string, error: unknown): void {
    this.misses += 1;
    if (isMiss(error)) {
      this.keys.delete(key);
      this.logger.debug('cache.miss', { key, reason: error.kind });
      return;
    }
    this.logger.warn('cache.backend.error', {
      key,
      error: errorMessage(error),
    });
  }

  private async invalidateWhere(
    matches: (keyPath: string) => boolean
  ): Promise<string[]> {
    await this.pruneIndex();
    const doomed = [...this.keys].filter((key) => matches(pathOfCacheKey(key)));
    for (const key of doomed) {
      await this.delete(key);
    }
    if (doomed.length > 0) {
      this.logger.debug('cache.invalidated', { keys: doomed });
    }
    return doomed;
  }
}

function isMiss(error: unknown): error is CacheError {
  return (
    error instanceof CacheError &&
    (error.kind === ErrorKind.CacheKeyNotFound ||
      error.kind === ErrorKind.CacheEntryExpired ||
      error.kind === ErrorKind.CacheNotFoundInAny ||
      error.kind === ErrorKind.CacheDisabled)
  );
}
