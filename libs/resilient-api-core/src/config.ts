import { z } from 'zod';
import { ConfigurationError } from './errors';

const RetrySchema = z.object({
  maxRetries: z.number().int().min(0).default(3),
  retryDelayMs: z.number().int().min(0).default(1_000),
  maxDelayMs: z.number().int().min(0).default(30_000),
  retryOnCodes: z
    .array(z.number().int().min(100).max(599))
    .default([429, 500, 502, 503, 504]),
});

const CircuitBreakerSchema = z.object({
  threshold: z.number().int().positive().default(5),
  timeoutMs: z.number().int().positive().default(30_000),
  successThreshold: z.number().int().positive().default(2),
});

export const ApiClientConfigSchema = z.object({
  apiEndpoint: z.string().url(),
  tokenUrl: z.string().url().optional(),
  clientId: z.string().optional(),
  clientSecret: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  refreshToken: z.string().optional(),
  accessToken: z.string().optional(),
  scopes: z.array(z.string()).optional(),
  userAgent: z.string().optional(),
  timeoutMs: z.number().int().positive().default(30_000),
  retry: RetrySchema.default({}),
  circuitBreaker: CircuitBreakerSchema.default({}),
  rateLimit: z.object({ requestsPerSecond: z.number().positive() }).optional(),
  debug: z.boolean().default(false),
});

export type ApiClientConfigInput = z.input<typeof ApiClientConfigSchema>;
export type ApiClientConfig = z.output<typeof ApiClientConfigSchema>;

/**
 * Validates and fills defaults; throws {@link ConfigurationError} listing
 * every issue.
 */
export function parseApiClientConfig(input: unknown): ApiClientConfig {
  const result = ApiClientConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`
      )
    );
  }
  return result.data;
}

const numberFromEnv = (
  name: string,
  value: string | undefined,
  issues: string[]
): number | undefined => {
  if (value === undefined || value === '') return undefined;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    issues.push(`${name}: expected a number, received "${value}"`);
    return undefined;
  }
  return parsed;
};

const stringFromEnv = (value: string | undefined): string | undefined =>
  value === '' ? undefined : value;

/**
 * Builds the client configuration from `API_*` environment variables. Explicit
 * overrides win over the environment.
 */
export function loadApiClientConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ApiClientConfigInput> = {}
): ApiClientConfig {
  const issues: string[] = [];
  const maxRetries = numberFromEnv(
    'API_MAX_RETRIES',
    env.API_MAX_RETRIES,
    issues
  );
  const timeoutMs = numberFromEnv('API_TIMEOUT_MS', env.API_TIMEOUT_MS, issues);
  const requestsPerSecond = numberFromEnv(
    'API_RATE_LIMIT_RPS',
    env.API_RATE_LIMIT_RPS,
    issues
  );
  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return parseApiClientConfig({
    apiEndpoint: stringFromEnv(env.API_ENDPOINT),
    tokenUrl: stringFromEnv(env.API_TOKEN_URL),
    clientId: stringFromEnv(env.API_CLIENT_ID),
    clientSecret: stringFromEnv(env.API_CLIENT_SECRET),
    username: stringFromEnv(env.API_USERNAME),
    password: stringFromEnv(env.API_PASSWORD),
    refreshToken: stringFromEnv(env.API_REFRESH_TOKEN),
    accessToken: stringFromEnv(env.API_ACCESS_TOKEN),
    timeoutMs,
    retry: maxRetries === undefined ? undefined : { maxRetries },
    rateLimit:
      requestsPerSecond === undefined ? undefined : { requestsPerSecond },
    ...overrides,
  });
}
