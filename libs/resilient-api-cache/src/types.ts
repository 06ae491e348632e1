export interface CacheEntry {
  data: Uint8Array;
  /** Entries are served only while the clock is before this instant. */
  expiresAt: Date;
  etag?: string;
}

/**
 * Pluggable key/value store for response bytes. `get` rejects with a
 * `CacheError` on a miss or an expired entry.
 */
export interface CacheBackend {
  get(key: string): Promise<CacheEntry>;
  set(key: string, entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
  has(key: string): Promise<boolean>;
}
