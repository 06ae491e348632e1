import {
  ErrorKind,
  errorMessage,
  findPipelineError,
  getHeader,
  noopLogger,
  type ApiResponse,
  type Logger,
  type QueryParams,
} from '@resilient-api/core';
import type { CacheManager } from './cacheManager';

/** The slice of `ApiHttpClient` the warmer needs. */
export interface WarmingClient {
  get(
    path: string,
    query?: QueryParams,
    signal?: AbortSignal
  ): Promise<ApiResponse>;
}

export interface WarmResult {
  warmed: string[];
  failed: Array<{ path: string; error: unknown }>;
}

export interface CacheWarmerOptions {
  ttlMs?: number;
  logger?: Logger;
}

/** Pre-populates the cache by issuing GETs for a list of paths in turn. */
export class CacheWarmer {
  private readonly logger: Logger;

  constructor(
    private readonly client: WarmingClient,
    private readonly manager: CacheManager,
    private readonly options: CacheWarmerOptions = {}
  ) {
    this.logger = options.logger ?? noopLogger;
  }

  async warm(
    paths: readonly string[],
    signal?: AbortSignal
  ): Promise<WarmResult> {
    const result: WarmResult = { warmed: [], failed: [] };

    for (const path of paths) {
      try {
        const response = await this.client.get(path, undefined, signal);
        const key = this.manager.getCacheKey('GET', path);
        const etag = getHeader(response.headers, 'ETag');
        const ttlMs = this.options.ttlMs;
        if (etag) {
          await this.manager.setWithEtag(key, response.body, etag, ttlMs);
        } else {
          await this.manager.set(key, response.body, ttlMs);
        }
        result.warmed.push(path);
      } catch (error) {
        if (findPipelineError(error, ErrorKind.Cancelled)) throw error;
        this.logger.warn('cache.warm.failed', {
          path,
          error: errorMessage(error),
        });
        result.failed.push({ path, error });
      }
    }

    this.logger.info('cache.warm.completed', {
      warmed: result.warmed.length,
      failed: result.failed.length,
    });
    return result;
  }
}
