import type {
  ApiRequest,
  ApiResponse,
  HttpHeaders,
  HttpMethod,
  QueryParams,
} from './types';

export interface ApiRequestInit {
  method: HttpMethod;
  path: string;
  query?: QueryParams;
  headers?: HttpHeaders;
  body?: Uint8Array;
  metadata?: Record<string, unknown>;
  signal?: AbortSignal;
}

export function createApiRequest(init: ApiRequestInit): ApiRequest {
  return {
    method: init.method,
    path: init.path,
    query: init.query,
    headers: { ...init.headers },
    body: init.body,
    metadata: { ...init.metadata },
    signal: init.signal,
  };
}

/**
 * Copy used for a single attempt, so retries never see a previous attempt's
 * mutations.
 */
export function cloneApiRequest(request: ApiRequest): ApiRequest {
  return {
    ...request,
    query: request.query ? { ...request.query } : undefined,
    headers: { ...request.headers },
    metadata: { ...request.metadata },
    cachedResponse: undefined,
  };
}

export function getHeader(
  headers: HttpHeaders,
  name: string
): string | undefined {
  const lower = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === lower) return value;
  }
  return undefined;
}

/** Sets a header, replacing any entry whose name differs only by case. */
export function setHeader(
  headers: HttpHeaders,
  name: string,
  value: string
): void {
  const lower = name.toLowerCase();
  for (const key of Object.keys(headers)) {
    if (key.toLowerCase() === lower && key !== name) delete headers[key];
  }
  headers[name] = value;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function encodeJson(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

export function encodeText(value: string): Uint8Array {
  return encoder.encode(value);
}

export function decodeText(body: Uint8Array): string {
  return decoder.decode(body);
}

export function decodeJson<T>(body: Uint8Array): T {
  return JSON.parse(decoder.decode(body)) as T;
}

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 300;
}

export function emptyResponse(
  statusCode: number,
  error?: unknown
): ApiResponse {
  return { statusCode, headers: {}, body: new Uint8Array(0), error };
}

/**
 * Stable `key=value&...` encoding with sorted keys; array values keep their
 * order.
 */
export function encodeQuery(query: QueryParams | undefined): string {
  if (!query) return '';
  const params = new URLSearchParams();
  for (const key of Object.keys(query).sort()) {
    const value = query[key];
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      params.set(key, value.join(','));
    } else {
      params.set(key, String(value));
    }
  }
  return params.toString();
}
