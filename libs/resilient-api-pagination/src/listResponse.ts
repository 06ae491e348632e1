import {
  decodeJson,
  type ApiHttpClient,
  type QueryParams,
} from '@resilient-api/core';
import { z } from 'zod';

export interface Link {
  href: string;
  method?: string;
}

export interface Pagination {
  total_results: number;
  total_pages: number;
  first: Link;
  last: Link;
  next?: Link | null;
  previous?: Link | null;
}

export interface ListResponse<T> {
  pagination: Pagination;
  resources: T[];
}

export const LinkSchema = z.object({
  href: z.string(),
  method: z.string().optional(),
});

export const PaginationSchema = z.object({
  total_results: z.number().int().nonnegative(),
  total_pages: z.number().int().nonnegative(),
  first: LinkSchema,
  last: LinkSchema,
  next: LinkSchema.nullish(),
  previous: LinkSchema.nullish(),
});

export const ListEnvelopeSchema = z.object({
  pagination: PaginationSchema,
  resources: z.array(z.unknown()),
});

/** Validates the list envelope, then each resource against `item`. */
export function parseListResponse<T>(
  json: unknown,
  item: z.ZodType<T, z.ZodTypeDef, unknown>
): ListResponse<T> {
  const envelope = ListEnvelopeSchema.parse(json);
  return {
    pagination: envelope.pagination,
    resources: envelope.resources.map((resource) => item.parse(resource)),
  };
}

/** Source of list pages; `params` carries `page` and `per_page`. */
export interface PaginationClient<T> {
  listWithPath(
    path: string,
    params: QueryParams | undefined,
    signal?: AbortSignal
  ): Promise<ListResponse<T>>;
}

/**
 * Lists through an {@link ApiHttpClient}. Every page is validated against the
 * list envelope, and its resources against `itemSchema` when one is given.
 *
 * @example
 * ```typescript
 * const apps = createHttpPaginationClient(client.http, AppSchema);
 * const query = { order_by: 'name' };
 * for await (const app of new PaginationIterator(apps, '/v3/apps', query)) {
 *   console.log(app.name);
 * }
 * ```
 */
export function createHttpPaginationClient(
  http: ApiHttpClient
): PaginationClient<unknown>;
export function createHttpPaginationClient<T>(
  http: ApiHttpClient,
  itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>
): PaginationClient<T>;
export function createHttpPaginationClient(
  http: ApiHttpClient,
  itemSchema: z.ZodType<unknown, z.ZodTypeDef, unknown> = z.unknown()
): PaginationClient<unknown> {
  return {
    listWithPath: async (path, params, signal) => {
      const response = await http.get(path, params, signal);
      return parseListResponse(decodeJson<unknown>(response.body), itemSchema);
    },
  };
}
