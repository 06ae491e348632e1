import type { z } from 'zod';
import type { TokenManager } from './auth/OAuth2TokenManager';
import {
  ApiError,
  CancelledError,
  ErrorCode,
  ResponseError,
  TimeoutError,
  TransportError,
  parseResponseError,
} from './errors';
import { InterceptorChain } from './interceptorChain';
import {
  DEFAULT_RETRY_CONFIG,
  METADATA_DEADLINE,
  RETRY_HEADER,
} from './interceptors';
import { noopLogger } from './logging';
import {
  cloneApiRequest,
  createApiRequest,
  decodeJson,
  decodeText,
  emptyResponse,
  encodeJson,
  encodeQuery,
  getHeader,
  setHeader,
  type ApiRequestInit,
} from './request';
import { fetchTransport } from './transport/fetchTransport';
import type {
  ApiRequest,
  ApiResponse,
  Clock,
  HttpMethod,
  HttpTransport,
  Logger,
  QueryParams,
  RawHttpResponse,
  RetryConfig,
} from './types';

export const DEFAULT_TIMEOUT_MS = 30_000;

export interface ApiHttpClientConfig {
  baseUrl: string;
  transport?: HttpTransport;
  chain?: InterceptorChain;
  /** Retry loop settings; the response interceptors decide eligibility. */
  retry?: RetryConfig;
  /**
   * Per-attempt timeout. A deadline stamped into request metadata can shorten
   * it.
   */
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
  /** When present, a 401 triggers one token refresh and one re-send. */
  tokenManager?: TokenManager;
  clock?: Clock;
}

export interface JsonRequestInit<T> {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
  signal?: AbortSignal;
  schema?: z.ZodType<T, z.ZodTypeDef, unknown>;
}

// Error documents for responses whose body is not a REST error document.
const STATUS_FALLBACKS: Record<number, { code: number; title: string }> = {
  400: { code: ErrorCode.BadRequest, title: 'BadRequest' },
  401: { code: ErrorCode.NotAuthenticated, title: 'NotAuthenticated' },
  403: { code: ErrorCode.NotAuthorized, title: 'NotAuthorized' },
  404: { code: ErrorCode.NotFound, title: 'ResourceNotFound' },
  422: { code: ErrorCode.UnprocessableEntity, title: 'UnprocessableEntity' },
  429: { code: ErrorCode.TooManyRequests, title: 'RateLimitExceeded' },
  503: { code: ErrorCode.ServiceUnavailable, title: 'ServiceUnavailable' },
};

/**
 * Executes {@link ApiRequest}s through an {@link InterceptorChain} and a
 * transport.
 *
 * Every attempt works on its own copy of the request: request interceptors
 * run, a cached response short-circuits the attempt, otherwise the transport
 * is called under the attempt timeout and the response interceptors run,
 * including for transport failures (reported as `response.error`). Responses
 * flagged with `X-Should-Retry: true` are retried with exponential backoff and
 * jitter.
 *
 * @example
 * ```typescript
 * const chain = new InterceptorChain()
 *   .addRequestInterceptor(
 *     createAuthInterceptor({ getToken: (s) => tokens.getToken(s) })
 *   )
 *   .addResponseInterceptor(createRetryResponseInterceptor());
 * const client = new ApiHttpClient({
 *   baseUrl: 'https://api.example.com',
 *   chain,
 * });
 * const apps = await client.requestJson<AppList>({
 *   method: 'GET',
 *   path: '/v3/apps',
 * });
 * ```
 */
export class ApiHttpClient {
  readonly baseUrl: string;
  readonly chain: InterceptorChain;
  private readonly transport: HttpTransport;
  private readonly retry: RetryConfig;
  private readonly timeoutMs: number;
  private readonly userAgent?: string;
  private readonly logger: Logger;
  private readonly tokenManager?: TokenManager;
  private readonly now: Clock;

  constructor(config: ApiHttpClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.chain = config.chain ?? new InterceptorChain();
    this.transport = config.transport ?? fetchTransport;
    this.retry = config.retry ?? DEFAULT_RETRY_CONFIG;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = config.userAgent;
    this.logger = config.logger ?? noopLogger;
    this.tokenManager = config.tokenManager;
    this.now = config.clock ?? Date.now;
  }

  /**
   * Runs the full request/response cycle, retries included. Resolves with the
   * final response when its status is below 400; otherwise rejects with a
   * {@link ResponseError}, or with the transport failure when no response
   * arrived.
   */
  async do(request: ApiRequest): Promise<ApiResponse> {
    const base = cloneApiRequest(request);
    this.applyDefaultHeaders(base);

    const maxAttempts = 1 + Math.max(0, this.retry.maxRetries);
    let refreshed = false;
    let attempt = 0;
    let response: ApiResponse;

    for (;;) {
      attempt += 1;
      response = await this.runAttempt(base, attempt);

      if (
        response.statusCode === 401 &&
        this.tokenManager &&
        !refreshed &&
        !response.fromCache
      ) {
        refreshed = true;
        this.logger.info('http.auth.refresh', {
          method: base.method,
          path: base.path,
        });
        await this.tokenManager.refreshToken(base.signal);
        response = await this.runAttempt(base, attempt);
      }

      const flagged = getHeader(response.headers, RETRY_HEADER) === 'true';
      if (!flagged || attempt >= maxAttempts) {
        break;
      }

      const delayMs = this.retryDelay(response, attempt);
      this.logger.warn('http.retry.scheduled', {
        method: base.method,
        path: base.path,
        attempt,
        status: response.statusCode,
        delayMs,
      });
      await this.sleep(delayMs, base.signal);
    }

    if (response.error !== undefined) {
      throw response.error;
    }
    if (response.statusCode >= 400) {
      throw this.toResponseError(response);
    }
    return response;
  }

  get(
    path: string,
    query?: QueryParams,
    signal?: AbortSignal
  ): Promise<ApiResponse> {
    return this.send({ method: 'GET', path, query, signal });
  }

  post(
    path: string,
    body?: unknown,
    signal?: AbortSignal
  ): Promise<ApiResponse> {
    return this.send({ method: 'POST', path, body: jsonBody(body), signal });
  }

  put(
    path: string,
    body?: unknown,
    signal?: AbortSignal
  ): Promise<ApiResponse> {
    return this.send({ method: 'PUT', path, body: jsonBody(body), signal });
  }

  patch(
    path: string,
    body?: unknown,
    signal?: AbortSignal
  ): Promise<ApiResponse> {
    return this.send({ method: 'PATCH', path, body: jsonBody(body), signal });
  }

  delete(path: string, signal?: AbortSignal): Promise<ApiResponse> {
    return this.send({ method: 'DELETE', path, signal });
  }

  /**
   * Sends a JSON request and decodes the response body, validating it when a
   * schema is given.
   */
  async requestJson<T>(init: JsonRequestInit<T>): Promise<T> {
    const response = await this.send({
      method: init.method,
      path: init.path,
      query: init.query,
      headers: init.headers,
      body: jsonBody(init.body),
      signal: init.signal,
    });
    if (init.schema) {
      return init.schema.parse(JSON.parse(decodeText(response.body)));
    }
    return decodeJson<T>(response.body);
  }

  resolveUrl(path: string, query?: QueryParams): string {
    const url = /^https?:\/\//i.test(path)
      ? path
      : `${this.baseUrl}${path.startsWith('/') ? '' : '/'}${path}`;
    const qs = encodeQuery(query);
    if (!qs) return url;
    return `${url}${url.includes('?') ? '&' : '?'}${qs}`;
  }

  private send(init: ApiRequestInit): Promise<ApiResponse> {
    return this.do(createApiRequest(init));
  }

  private applyDefaultHeaders(request: ApiRequest): void {
    if (getHeader(request.headers, 'Accept') === undefined) {
      setHeader(request.headers, 'Accept', 'application/json');
    }
    const contentType = getHeader(request.headers, 'Content-Type');
    if (request.body !== undefined && contentType === undefined) {
      setHeader(request.headers, 'Content-Type', 'application/json');
    }
    const userAgent = getHeader(request.headers, 'User-Agent');
    if (this.userAgent && userAgent === undefined) {
      setHeader(request.headers, 'User-Agent', this.userAgent);
    }
  }

  private async runAttempt(
    base: ApiRequest,
    attempt: number
  ): Promise<ApiResponse> {
    const request = cloneApiRequest(base);
    await this.chain.executeRequestInterceptors(request);

    if (request.cachedResponse) {
      this.logger.debug('http.request.cached', {
        method: request.method,
        path: request.path,
      });
      return { ...request.cachedResponse, fromCache: true };
    }

    this.logger.debug('http.request.attempt', {
      method: request.method,
      path: request.path,
      attempt,
    });
    const response = await this.callTransport(request);
    await this.chain.executeResponseInterceptors(request, response);
    return response;
  }

  private async callTransport(request: ApiRequest): Promise<ApiResponse> {
    const signal = request.signal;
    if (signal?.aborted) {
      return emptyResponse(0, new CancelledError(signal.reason));
    }

    const timeoutMs = this.attemptTimeout(request);
    if (timeoutMs !== undefined && timeoutMs <= 0) {
      return emptyResponse(0, new TimeoutError(this.timeoutMs));
    }

    const controller = new AbortController();
    let timedOut = false;
    const timer =
      timeoutMs === undefined
        ? undefined
        : setTimeout(() => {
            timedOut = true;
            controller.abort();
          }, timeoutMs);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const raw = await untilAborted(
        this.transport(
          {
            method: request.method,
            url: this.resolveUrl(request.path, request.query),
            headers: { ...request.headers },
            body: request.body,
          },
          controller.signal
        ),
        controller.signal
      );
      return {
        statusCode: raw.status,
        headers: { ...raw.headers },
        body: raw.body,
      };
    } catch (error) {
      if (timedOut && timeoutMs !== undefined) {
        return emptyResponse(0, new TimeoutError(timeoutMs));
      }
      if (signal?.aborted) {
        return emptyResponse(0, new CancelledError(signal.reason));
      }
      return emptyResponse(0, new TransportError(error));
    } finally {
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }

  private attemptTimeout(request: ApiRequest): number | undefined {
    const configured = this.timeoutMs > 0 ? this.timeoutMs : undefined;
    const deadline = request.metadata[METADATA_DEADLINE];
    if (typeof deadline !== 'number') return configured;
    const remaining = deadline - this.now();
    return configured === undefined
      ? remaining
      : Math.min(configured, remaining);
  }

  private retryDelay(response: ApiResponse, attempt: number): number {
    const retryAfter = parseRetryAfter(
      getHeader(response.headers, 'Retry-After'),
      this.now()
    );
    if (retryAfter !== undefined) {
      return Math.min(retryAfter, this.retry.maxDelayMs);
    }
    const baseDelay = this.retry.retryDelayMs * 2 ** (attempt - 1);
    const jitterFactor = 0.8 + Math.random() * 0.4;
    return Math.min(baseDelay * jitterFactor, this.retry.maxDelayMs);
  }

  private toResponseError(response: ApiResponse): ResponseError {
    const parsed = parseResponseError(response.body, response.statusCode);
    if (parsed && parsed.errors.length > 0) return parsed;

    const fallback = STATUS_FALLBACKS[response.statusCode] ?? {
      code: response.statusCode,
      title: `HTTP ${response.statusCode}`,
    };
    const text = decodeText(response.body).trim();
    return new ResponseError(response.statusCode, [
      new ApiError(
        fallback.code,
        fallback.title,
        text || `status ${response.statusCode}`
      ),
    ]);
  }

  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancelledError(signal.reason));
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(new CancelledError(signal?.reason));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}

/** Seconds or an HTTP date; returns milliseconds from `now`. */
export function parseRetryAfter(
  value: string | undefined,
  now: number = Date.now()
): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const date = Date.parse(value);
  if (!Number.isNaN(date)) {
    const diff = date - now;
    return diff > 0 ? diff : 0;
  }
  return undefined;
}

const jsonBody = (body: unknown): Uint8Array | undefined =>
  body === undefined ? undefined : encodeJson(body);

// Rejects once the signal aborts, whether or not the transport observes it.
function untilAborted(
  pending: Promise<RawHttpResponse>,
  signal: AbortSignal
): Promise<RawHttpResponse> {
  return new Promise((resolve, reject) => {
    const onAbort = () => reject(signal.reason ?? new Error('aborted'));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    pending.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
