import { CacheError, ErrorKind, type Clock } from '@resilient-api/core';
import type { CacheBackend, CacheEntry } from './types';

export const DEFAULT_CACHE_SIZE = 1000;

/**
 * In-process backend bounded to `maxSize` keys. When full, the least recently
 * used key is evicted; reads and writes both count as use. Expired entries are
 * purged when read and by {@link MemoryCache.cleanup}.
 */
export class MemoryCache implements CacheBackend {
  readonly maxSize: number;
  // Map iteration order doubles as recency order: oldest first.
  private readonly entries = new Map<string, CacheEntry>();
  private cleanupTimer?: ReturnType<typeof setInterval>;

  constructor(
    maxSize: number = DEFAULT_CACHE_SIZE,
    private readonly now: Clock = Date.now
  ) {
    this.maxSize = maxSize > 0 ? Math.floor(maxSize) : DEFAULT_CACHE_SIZE;
  }

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<CacheEntry> {
    const entry = this.entries.get(key);
    if (!entry) {
      throw new CacheError(ErrorKind.CacheKeyNotFound, { key });
    }
    if (this.isExpired(entry)) {
      this.entries.delete(key);
      throw new CacheError(ErrorKind.CacheEntryExpired, { key });
    }
    this.touch(key, entry);
    return { ...entry, data: entry.data.slice() };
  }

  async set(key: string, entry: CacheEntry): Promise<void> {
    this.entries.delete(key);
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(key, { ...entry, data: entry.data.slice() });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  async has(key: string): Promise<boolean> {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry);
  }

  /** Removes every expired entry; returns how many were removed. */
  cleanup(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  startCleanup(intervalMs: number): void {
    this.stop();
    this.cleanupTimer = setInterval(() => this.cleanup(), intervalMs);
    this.cleanupTimer.unref?.();
  }

  stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() >= entry.expiresAt.getTime();
  }

  private touch(key: string, entry: CacheEntry): void {
    this.entries.delete(key);
    this.entries.set(key, entry);
  }
}
