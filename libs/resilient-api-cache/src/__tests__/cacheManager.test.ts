import { describe, expect, it, vi } from 'vitest';
import { encodeText, type Logger } from '@resilient-api/core';
import { CacheManager, CacheStats, pathOfCacheKey } from '../cacheManager';
import { MemoryCache } from '../memoryCache';
import type { CacheBackend } from '../types';

const createLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const setup = (options: { enableEtags?: boolean } = {}) => {
  let now = 10_000;
  const clock = () => now;
  const logger = createLogger();
  const manager = new CacheManager(new MemoryCache(100, clock), {
    defaultTtlMs: 1_000,
    clock,
    logger,
    ...options,
  });
  return {
    manager,
    logger,
    advance: (ms: number) => {
      now += ms;
    },
  };
};

describe('CacheManager', () => {
  it('builds keys from method, path and sorted params', () => {
    const { manager } = setup();

    expect(manager.getCacheKey('GET', '/v3/apps')).toBe('GET:/v3/apps');
    expect(
      manager.getCacheKey('GET', '/v3/apps', {
        per_page: 50,
        names: ['a', 'b'],
      })
    ).toBe('GET:/v3/apps:names=a%2Cb&per_page=50');
    expect(manager.getCacheKey('GET', '/v3/apps', {})).toBe('GET:/v3/apps');
  });

  it('extracts the path from a key', () => {
    expect(pathOfCacheKey('GET:/v3/apps')).toBe('/v3/apps');
    expect(pathOfCacheKey('GET:/v3/apps:page=2')).toBe('/v3/apps');
    expect(pathOfCacheKey('plain')).toBe('plain');
  });

  it('applies the default TTL', async () => {
    const { manager, advance } = setup();
    await manager.set('GET:/v3/apps', encodeText('[]'));

    advance(999);
    const stored = await manager.get('GET:/v3/apps');
    expect(new TextDecoder().decode(stored)).toBe('[]');
    advance(1);
    await expect(manager.get('GET:/v3/apps')).rejects.toMatchObject({
      kind: 'cache_entry_expired',
    });
  });

  it('counts hits, misses and sets', async () => {
    const { manager, logger } = setup();
    await manager.set('a', encodeText('1'));
    await manager.get('a');
    await manager.getEntry('a');
    await manager.getEntry('a');
    expect(await manager.getEntry('missing')).toBeUndefined();

    const stats = manager.getStats();
    expect(stats).toMatchObject({ hits: 3, misses: 1, sets: 1 });
    expect(stats.getHitRate()).toBe(0.75);
    expect(logger.debug).toHaveBeenCalledWith('cache.miss', {
      key: 'missing',
      reason: 'cache_key_not_found',
    });
  });

  it('reports a zero hit rate before any lookups', () => {
    expect(new CacheStats().getHitRate()).toBe(0);
  });

  it('peek reads without counting', async () => {
    const { manager } = setup();
    await manager.setWithEtag('a', encodeText('1'), '"v1"');

    expect((await manager.peek('a'))?.etag).toBe('"v1"');
    expect(await manager.peek('b')).toBeUndefined();
    expect(manager.getStats()).toMatchObject({ hits: 0, misses: 0 });
  });

  it('returns stored ETags only when enabled', async () => {
    const enabled = setup();
    await enabled.manager.setWithEtag('a', encodeText('1'), '"v1"');
    expect(await enabled.manager.getEtag('a')).toBe('"v1"');

    const disabled = setup({ enableEtags: false });
    await disabled.manager.setWithEtag('a', encodeText('1'), '"v1"');
    expect(await disabled.manager.getEtag('a')).toBeUndefined();
    expect((await disabled.manager.peek('a'))?.etag).toBeUndefined();
  });

  it('logs backend failures and treats them as misses', async () => {
    const failure = new Error('backend offline');
    const backend: CacheBackend = {
      get: () => Promise.reject(failure),
      set: () => Promise.resolve(),
      delete: () => Promise.resolve(),
      clear: () => Promise.resolve(),
      has: () => Promise.resolve(false),
    };
    const logger = createLogger();
    const manager = new CacheManager(backend, { logger });

    expect(await manager.getEntry('a')).toBeUndefined();
    await expect(manager.peek('a')).rejects.toBe(failure);
    expect(logger.warn).toHaveBeenCalledWith('cache.backend.error', {
      key: 'a',
      error: 'backend offline',
    });
    expect(manager.getStats().misses).toBe(1);
  });

  describe('invalidation', () => {
    const seed = async (manager: CacheManager) => {
      for (const key of [
        'GET:/v3/apps',
        'GET:/v3/apps:page=2',
        'GET:/v3/apps/guid-1',
        'GET:/v3/apps/guid-1/env',
        'GET:/v3/apps/guid-2',
        'GET:/v3/apps-extra',
        'GET:/v3/spaces',
      ]) {
        await manager.set(key, encodeText(key));
      }
    };

    it('invalidatePrefix drops the path and everything beneath it', async () => {
      const { manager } = setup();
      await seed(manager);

      const deleted = await manager.invalidatePrefix('/v3/apps/guid-1');

      expect(deleted).toEqual([
        'GET:/v3/apps/guid-1',
        'GET:/v3/apps/guid-1/env',
      ]);
      expect(await manager.peek('GET:/v3/apps/guid-2')).toBeDefined();
    });

    it('invalidatePath drops only exact path matches', async () => {
      const { manager } = setup();
      await seed(manager);

      expect(await manager.invalidatePath('/v3/apps')).toEqual([
        'GET:/v3/apps',
        'GET:/v3/apps:page=2',
      ]);
      expect(await manager.peek('GET:/v3/apps-extra')).toBeDefined();
    });

    it('invalidateResource also drops the parent collection', async () => {
      const { manager, logger } = setup();
      await seed(manager);

      const deleted = await manager.invalidateResource('/v3/apps/guid-1');

      expect(deleted).toEqual([
        'GET:/v3/apps/guid-1',
        'GET:/v3/apps/guid-1/env',
        'GET:/v3/apps',
        'GET:/v3/apps:page=2',
      ]);
      expect(await manager.peek('GET:/v3/apps/guid-2')).toBeDefined();
      expect(await manager.peek('GET:/v3/spaces')).toBeDefined();
      expect(logger.debug).toHaveBeenCalledWith('cache.invalidated', {
        keys: ['GET:/v3/apps/guid-1', 'GET:/v3/apps/guid-1/env'],
      });
    });

    it('keeps the key index bounded while the backend evicts', async () => {
      const backend = new MemoryCache(10);
      const manager = new CacheManager(backend);

      for (let page = 1; page <= 1_000; page += 1) {
        await manager.set(`GET:/v3/apps:page=${page}`, encodeText('{}'));
      }

      expect(backend.size).toBe(10);
      expect(manager.indexSize).toBeLessThanOrEqual(64);
      await manager.pruneIndex();
      expect(manager.indexSize).toBe(10);
    });

    it('skips expired keys when invalidating', async () => {
      const { manager, advance } = setup();
      await manager.set('GET:/v3/apps', encodeText('old'), 500);
      await manager.set('GET:/v3/apps/guid-1', encodeText('live'));
      advance(600);

      expect(await manager.invalidatePrefix('/v3/apps')).toEqual([
        'GET:/v3/apps/guid-1',
      ]);
      expect(manager.indexSize).toBe(0);
    });

    it('clear forgets every key', async () => {
      const { manager } = setup();
      await seed(manager);
      await manager.clear();

      expect(await manager.invalidatePrefix('/v3')).toEqual([]);
    });
  });
});
