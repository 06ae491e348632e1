import type {
  HttpHeaders,
  HttpTransport,
  RawHttpResponse,
  TransportRequest,
} from '../types';

export type FetchFunction = (
  input: string,
  init: RequestInit
) => Promise<Response>;

export interface FetchTransportOptions {
  /** Defaults to the global `fetch`. */
  fetch?: FetchFunction;
}

const toHeaders = (source: Headers): HttpHeaders => {
  const headers: HttpHeaders = {};
  source.forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
};

/**
 * Builds a transport on top of a fetch implementation. Response header names
 * come back lower-cased, as the Fetch API reports them, and the body is read
 * in full.
 */
export function createFetchTransport(
  options: FetchTransportOptions = {}
): HttpTransport {
  const doFetch: FetchFunction =
    options.fetch ?? ((input, init) => fetch(input, init));

  return async (
    req: TransportRequest,
    signal: AbortSignal
  ): Promise<RawHttpResponse> => {
    const body = req.body;
    const response = await doFetch(req.url, {
      method: req.method,
      headers: req.headers,
      body: body && body.byteLength > 0 ? new Blob([body]) : undefined,
      signal,
    });

    return {
      status: response.status,
      headers: toHeaders(response.headers),
      body: new Uint8Array(await response.arrayBuffer()),
    };
  };
}

export const fetchTransport: HttpTransport = createFetchTransport();
