import { describe, expect, it } from 'vitest';
import { loadApiClientConfigFromEnv, parseApiClientConfig } from '../config';
import { ConfigurationError } from '../errors';

describe('parseApiClientConfig', () => {
  it('fills defaults', () => {
    const config = parseApiClientConfig({
      apiEndpoint: 'https://api.example.com',
    });

    expect(config.timeoutMs).toBe(30_000);
    expect(config.retry).toEqual({
      maxRetries: 3,
      retryDelayMs: 1_000,
      maxDelayMs: 30_000,
      retryOnCodes: [429, 500, 502, 503, 504],
    });
    expect(config.circuitBreaker).toEqual({
      threshold: 5,
      timeoutMs: 30_000,
      successThreshold: 2,
    });
    expect(config.rateLimit).toBeUndefined();
    expect(config.debug).toBe(false);
  });

  it('lists every invalid field', () => {
    let failure: unknown;
    try {
      parseApiClientConfig({ apiEndpoint: 'not a url', timeoutMs: -1 });
    } catch (error) {
      failure = error;
    }

    expect(failure).toBeInstanceOf(ConfigurationError);
    const issues = failure instanceof ConfigurationError ? failure.issues : [];
    expect(issues.map((issue) => issue.split(':')[0])).toEqual([
      'apiEndpoint',
      'timeoutMs',
    ]);
  });
});

describe('loadApiClientConfigFromEnv', () => {
  it('reads API_* variables', () => {
    const config = loadApiClientConfigFromEnv({
      API_ENDPOINT: 'https://api.example.com',
      API_CLIENT_ID: 'test-client',
      API_CLIENT_SECRET: 'test-secret',
      API_USERNAME: '',
      API_MAX_RETRIES: '5',
      API_TIMEOUT_MS: '1000',
      API_RATE_LIMIT_RPS: '10',
    });

    expect(config.apiEndpoint).toBe('https://api.example.com');
    expect(config.clientId).toBe('test-client');
    expect(config.clientSecret).toBe('test-secret');
    expect(config.username).toBeUndefined();
    expect(config.retry.maxRetries).toBe(5);
    expect(config.retry.retryDelayMs).toBe(1_000);
    expect(config.timeoutMs).toBe(1_000);
    expect(config.rateLimit).toEqual({ requestsPerSecond: 10 });
  });

  it('lets explicit overrides win', () => {
    const config = loadApiClientConfigFromEnv(
      { API_ENDPOINT: 'https://api.example.com', API_TIMEOUT_MS: '1000' },
      { timeoutMs: 5_000, userAgent: 'deployer/2.0' }
    );

    expect(config.timeoutMs).toBe(5_000);
    expect(config.userAgent).toBe('deployer/2.0');
  });

  it('rejects non-numeric values', () => {
    expect(() =>
      loadApiClientConfigFromEnv({
        API_ENDPOINT: 'https://api.example.com',
        API_MAX_RETRIES: 'lots',
      })
    ).toThrow(
      'invalid configuration: API_MAX_RETRIES: expected a number, received "lots"'
    );
  });

  it('requires an endpoint', () => {
    expect(() => loadApiClientConfigFromEnv({})).toThrow(ConfigurationError);
  });
});
