import { CacheError, ErrorKind } from '@resilient-api/core';
import type { CacheBackend, CacheEntry } from './types';

/** Backend that stores nothing; reads always fail with `cache disabled`. */
export class NoOpCache implements CacheBackend {
  async get(key: string): Promise<CacheEntry> {
    throw new CacheError(ErrorKind.CacheDisabled, { key });
  }

  async set(): Promise<void> {}

  async delete(): Promise<void> {}

  async clear(): Promise<void> {}

  async has(): Promise<boolean> {
    return false;
  }
}
