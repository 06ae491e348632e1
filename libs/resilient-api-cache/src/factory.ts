import { CacheError, ErrorKind, type Clock } from '@resilient-api/core';
import { CacheManager, type CacheManagerOptions } from './cacheManager';
import { DEFAULT_CACHE_SIZE, MemoryCache } from './memoryCache';
import { NoOpCache } from './noopCache';
import type { CacheBackend } from './types';

export type CacheType = 'memory' | 'none';

export interface MemoryCacheConfig {
  maxSize?: number;
  /** 0 disables the periodic cleanup timer. */
  cleanupIntervalMs?: number;
}

export interface CacheConfig {
  /** Checked at runtime so configuration read from files fails loudly. */
  type: string;
  memory?: MemoryCacheConfig;
  options?: CacheManagerOptions;
}

export const DEFAULT_CLEANUP_INTERVAL_MS = 60_000;

export const DEFAULT_CACHE_CONFIG: Readonly<CacheConfig> = Object.freeze({
  type: 'memory',
  memory: Object.freeze({
    maxSize: DEFAULT_CACHE_SIZE,
    cleanupIntervalMs: DEFAULT_CLEANUP_INTERVAL_MS,
  }),
});

export function createCacheFromConfig(
  config: CacheConfig = DEFAULT_CACHE_CONFIG,
  clock?: Clock
): CacheBackend {
  switch (config.type) {
    case 'memory': {
      const memory = config.memory ?? {};
      const maxSize = memory.maxSize ?? DEFAULT_CACHE_SIZE;
      const cache = new MemoryCache(maxSize, clock);
      const interval = memory.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
      if (interval > 0) {
        cache.startCleanup(interval);
      }
      return cache;
    }
    case 'none':
      return new NoOpCache();
    default:
      throw new CacheError(ErrorKind.UnsupportedCacheType, {
        detail: config.type,
      });
  }
}

/**
 * Fluent construction of a backend and its manager.
 *
 * @example
 * ```typescript
 * const manager = new CacheBuilder()
 *   .withMemoryConfig(500, 30_000)
 *   .withOptions({ defaultTtlMs: 60_000 })
 *   .buildManager();
 * ```
 */
export class CacheBuilder {
  private config: CacheConfig = { type: 'memory' };

  withType(type: CacheType | string): this {
    this.config = { ...this.config, type };
    return this;
  }

  withMemoryConfig(
    maxSize: number,
    cleanupIntervalMs: number = DEFAULT_CLEANUP_INTERVAL_MS
  ): this {
    this.config = { ...this.config, memory: { maxSize, cleanupIntervalMs } };
    return this;
  }

  withOptions(options: CacheManagerOptions): this {
    this.config = { ...this.config, options };
    return this;
  }

  build(): CacheBackend {
    return createCacheFromConfig(this.config, this.config.options?.clock);
  }

  buildManager(): CacheManager {
    return new CacheManager(this.build(), this.config.options);
  }
}
