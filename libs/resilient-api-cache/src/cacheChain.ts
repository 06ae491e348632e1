import { CacheError, ErrorKind } from '@resilient-api/core';
import type { CacheBackend, CacheEntry } from './types';

/**
 * Tiered backends (L1, L2, ...). Reads try tiers in order and copy a
 * lower-tier hit into every tier above it before returning. Writes, deletes
 * and clears reach every tier and reject with the last tier error seen.
 *
 * @example
 * ```typescript
 * const cache = new CacheChain(new MemoryCache(100), new MemoryCache(10_000));
 * ```
 */
export class CacheChain implements CacheBackend {
  private readonly tiers: CacheBackend[];

  constructor(...tiers: CacheBackend[]) {
    this.tiers = tiers;
  }

  async get(key: string): Promise<CacheEntry> {
    for (let i = 0; i < this.tiers.length; i += 1) {
      let entry: CacheEntry;
      try {
        entry = await this.tiers[i].get(key);
      } catch {
        continue;
      }
      // Write-back failures do not turn a hit into a miss.
      await Promise.allSettled(
        this.tiers.slice(0, i).map((tier) => tier.set(key, entry))
      );
      return entry;
    }
    throw new CacheError(ErrorKind.CacheNotFoundInAny, { key });
  }

  set(key: string, entry: CacheEntry): Promise<void> {
    return this.fanOut((tier) => tier.set(key, entry));
  }

  delete(key: string): Promise<void> {
    return this.fanOut((tier) => tier.delete(key));
  }

  clear(): Promise<void> {
    return this.fanOut((tier) => tier.clear());
  }

  async has(key: string): Promise<boolean> {
    for (const tier of this.tiers) {
      if (await tier.has(key)) return true;
    }
    return false;
  }

  private async fanOut(
    operation: (tier: CacheBackend) => Promise<void>
  ): Promise<void> {
    let lastError: unknown;
    for (const tier of this.tiers) {
      try {
        await operation(tier);
      } catch (error) {
        lastError = error;
      }
    }
    if (lastError !== undefined) {
      throw lastError;
    }
  }
}
