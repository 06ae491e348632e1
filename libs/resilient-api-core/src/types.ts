export type HttpMethod =
  | 'GET'
  | 'HEAD'
  | 'OPTIONS'
  | 'POST'
  | 'PUT'
  | 'PATCH'
  | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type QueryValue = string | number | boolean | string[] | undefined;

export type QueryParams = Record<string, QueryValue>;

/**
 * Request value passed through the interceptor chain. Interceptors mutate it in
 * place; a request is owned by the single request/response cycle that created
 * it.
 */
export interface ApiRequest {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  headers: HttpHeaders;
  body?: Uint8Array;
  /** Side channel for interceptors (timing markers, cache keys, deadlines). */
  metadata: Record<string, unknown>;
  signal?: AbortSignal;
  /**
   * Set by a request-phase interceptor to answer the request without touching
   * the transport (fresh cache hit).
   */
  cachedResponse?: ApiResponse;
}

export interface ApiResponse {
  statusCode: number;
  headers: HttpHeaders;
  body: Uint8Array;
  /** Transport or pipeline failure observed for this cycle, if any. */
  error?: unknown;
  fromCache?: boolean;
}

export type RequestInterceptor = (request: ApiRequest) => void | Promise<void>;

export type ResponseInterceptor = (
  request: ApiRequest,
  response: ApiResponse
) => void | Promise<void>;

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: Uint8Array;
}

export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
}

export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

export interface RetryConfig {
  /** Retry attempts after the initial try. */
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly maxDelayMs: number;
  readonly retryOnCodes: readonly number[];
}

export interface CircuitBreakerConfig {
  /** Failures before the breaker opens. */
  threshold: number;
  /** Time after the last failure before a trial request is let through. */
  timeoutMs: number;
  /** Half-open successes needed to close again. */
  successThreshold: number;
}

export type Clock = () => number;
