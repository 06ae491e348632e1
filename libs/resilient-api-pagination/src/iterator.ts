import { noopLogger, type Logger, type QueryParams } from '@resilient-api/core';
import type { ListResponse, PaginationClient } from './listResponse';

export interface PaginationOptions {
  /** Sent as `per_page`; the server default applies when unset. */
  pageSize?: number;
  /** Stop after this many pages; 0 or unset means no limit. */
  maxPages?: number;
  logger?: Logger;
}

export const DEFAULT_PAGINATION_OPTIONS: Readonly<PaginationOptions> =
  Object.freeze({
    pageSize: 50,
    maxPages: 0,
  });

export interface PageResult<T> {
  page: number;
  items: T[];
  pagination: ListResponse<T>['pagination'];
}

function pageParams(
  params: QueryParams | undefined,
  page: number,
  pageSize?: number
): QueryParams {
  return pageSize
    ? { ...params, page, per_page: pageSize }
    : { ...params, page };
}

/**
 * Fetches pages 1, 2, ... while the previous page links to a next one, up to
 * `maxPages`.
 */
export async function* streamPages<T>(
  client: PaginationClient<T>,
  path: string,
  params?: QueryParams,
  options: PaginationOptions = {},
  signal?: AbortSignal
): AsyncGenerator<PageResult<T>, void, undefined> {
  const logger = options.logger ?? noopLogger;
  const maxPages = options.maxPages ?? 0;

  for (let page = 1; maxPages <= 0 || page <= maxPages; page += 1) {
    const response = await client.listWithPath(
      path,
      pageParams(params, page, options.pageSize),
      signal
    );
    logger.debug('pagination.page.fetched', {
      path,
      page,
      items: response.resources.length,
    });
    yield { page, items: response.resources, pagination: response.pagination };
    if (!response.pagination.next) return;
  }
}

export async function fetchAllPages<T>(
  client: PaginationClient<T>,
  path: string,
  params?: QueryParams,
  options: PaginationOptions = {},
  signal?: AbortSignal
): Promise<T[]> {
  const all: T[] = [];
  const pages = streamPages(client, path, params, options, signal);
  for await (const { items } of pages) {
    all.push(...items);
  }
  return all;
}

/**
 * Item-at-a-time walk over a paginated list. Pages are fetched lazily, one when
 * the buffered items run out.
 */
export class PaginationIterator<T> implements AsyncIterable<T> {
  private buffer: T[] = [];
  private page = 0;
  private morePages = true;

  constructor(
    private readonly client: PaginationClient<T>,
    private readonly path: string,
    private readonly params?: QueryParams,
    private readonly options: Omit<PaginationOptions, 'maxPages'> = {},
    private readonly signal?: AbortSignal
  ) {}

  /** True while items are buffered or the last page links to another. */
  hasNext(): boolean {
    return this.buffer.length > 0 || this.morePages;
  }

  /** The next item, or `undefined` once the list is exhausted. */
  async next(): Promise<T | undefined> {
    while (this.buffer.length === 0 && this.morePages) {
      await this.fetchNextPage();
    }
    return this.buffer.shift();
  }

  async all(): Promise<T[]> {
    const items: T[] = [];
    for await (const item of this) {
      items.push(item);
    }
    return items;
  }

  async forEach(fn: (item: T) => void | Promise<void>): Promise<void> {
    for await (const item of this) {
      await fn(item);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (this.buffer.length > 0 || this.morePages) {
      if (this.buffer.length === 0) {
        await this.fetchNextPage();
        continue;
      }
      const [item] = this.buffer.splice(0, 1);
      yield item;
    }
  }

  private async fetchNextPage(): Promise<void> {
    const page = this.page + 1;
    const response = await this.client.listWithPath(
      this.path,
      pageParams(this.params, page, this.options.pageSize),
      this.signal
    );
    this.options.logger?.debug('pagination.page.fetched', {
      path: this.path,
      page,
      items: response.resources.length,
    });
    this.page = page;
    this.buffer = [...response.resources];
    this.morePages = Boolean(response.pagination.next);
  }
}
