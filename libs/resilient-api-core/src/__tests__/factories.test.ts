import { describe, expect, it, vi } from 'vitest';
import { createApiClient } from '../factories';
import { encodeJson } from '../request';
import type {
  HttpTransport,
  Logger,
  RawHttpResponse,
  TransportRequest,
} from '../types';

const json = (status: number, body: unknown): RawHttpResponse => ({
  status,
  headers: {},
  body: encodeJson(body),
});

const createLogger = (): Logger => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
});

const routingTransport = (appsReplies: RawHttpResponse[]) => {
  const replies = [...appsReplies];
  return vi
    .fn<HttpTransport>()
    .mockImplementation(async (req: TransportRequest) => {
      if (req.url.endsWith('/oauth/token')) {
        return json(200, { access_token: 'api-token', expires_in: 3600 });
      }
      return replies.shift() ?? json(200, { resources: [] });
    });
};

describe('createApiClient', () => {
  it('wires auth, metrics, circuit breaker and retry into one client', async () => {
    const transport = routingTransport([
      json(503, {}),
      json(200, { resources: [] }),
    ]);
    const logger = createLogger();
    const api = createApiClient(
      {
        apiEndpoint: 'https://api.example.com',
        clientId: 'test-client',
        clientSecret: 'test-secret',
        retry: { maxRetries: 1, retryDelayMs: 1, maxDelayMs: 1 },
      },
      { transport, logger }
    );

    const response = await api.http.get('/v3/apps');

    expect(response.statusCode).toBe(200);
    expect(api.chain.size).toEqual({ request: 4, response: 4 });
    const calls = transport.mock.calls.map(([req]) => req.url);
    expect(calls).toEqual([
      'https://api.example.com/oauth/token',
      'https://api.example.com/v3/apps',
      'https://api.example.com/v3/apps',
    ]);
    expect(transport.mock.calls[1][0].headers.Authorization).toBe(
      'Bearer api-token'
    );
    expect(api.metrics.getMetrics('GET /v3/apps')).toMatchObject({
      totalRequests: 2,
      totalErrors: 1,
    });
    expect(api.circuitBreaker.snapshot()).toMatchObject({
      state: 'closed',
      failures: 0,
    });
    expect(logger.debug).toHaveBeenCalledWith('API Request', {
      method: 'GET',
      path: '/v3/apps',
    });
  });

  it('adds a rate limiter when configured', () => {
    const api = createApiClient(
      {
        apiEndpoint: 'https://api.example.com',
        accessToken: 'test-token',
        rateLimit: { requestsPerSecond: 5 },
      },
      { transport: routingTransport([]), logger: createLogger() }
    );

    expect(api.rateLimiter?.capacity).toBe(5);
    expect(api.chain.size).toEqual({ request: 5, response: 4 });
    api.close();
  });

  it('applies circuit breaker settings from the configuration', async () => {
    const transport = routingTransport([json(500, {}), json(200, {})]);
    const api = createApiClient(
      {
        apiEndpoint: 'https://api.example.com',
        accessToken: 'test-token',
        retry: { maxRetries: 0 },
        circuitBreaker: { threshold: 1, timeoutMs: 60_000 },
      },
      { transport, logger: createLogger() }
    );

    await expect(api.http.get('/v3/apps')).rejects.toThrow();
    await expect(api.http.get('/v3/apps')).rejects.toThrow(
      'request interceptor failed: circuit breaker is open'
    );
    expect(transport).toHaveBeenCalledTimes(1);
  });

  it('rejects on an open breaker before fetching a token or a permit', async () => {
    const transport = routingTransport([]);
    const api = createApiClient(
      {
        apiEndpoint: 'https://api.example.com',
        clientId: 'test-client',
        clientSecret: 'test-secret',
        circuitBreaker: { threshold: 1, timeoutMs: 60_000 },
        rateLimit: { requestsPerSecond: 2 },
      },
      { transport, logger: createLogger() }
    );
    api.circuitBreaker.recordFailure();

    await expect(api.http.get('/v3/apps')).rejects.toThrow(
      'request interceptor failed: circuit breaker is open'
    );

    expect(transport).not.toHaveBeenCalled();
    expect(api.tokenManager.currentToken()).toBeUndefined();
    expect(api.rateLimiter?.available).toBe(2);
    api.close();
  });
});
