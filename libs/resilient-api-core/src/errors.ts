import { z } from 'zod';

/**
 * Closed set of failure kinds raised by the pipeline. Callers branch on `kind`
 * rather than on message text or object identity.
 */
export const ErrorKind = {
  NoCredentials: 'no_credentials',
  TokenExchangeFailed: 'token_exchange_failed',
  StaticTokenCannotRefresh: 'static_token_cannot_refresh',
  Transport: 'transport',
  Timeout: 'timeout',
  Cancelled: 'cancelled',
  CircuitOpen: 'circuit_open',
  RequestInterceptorFailed: 'request_interceptor_failed',
  ResponseInterceptorFailed: 'response_interceptor_failed',
  CacheDisabled: 'cache_disabled',
  CacheKeyNotFound: 'cache_key_not_found',
  CacheEntryExpired: 'cache_entry_expired',
  CacheNotFoundInAny: 'cache_not_found_in_any',
  UnsupportedCacheType: 'unsupported_cache_type',
  UnsupportedResource: 'unsupported_resource',
  UnsupportedOperation: 'unsupported_operation',
  InvalidOperationData: 'invalid_operation_data',
  TransactionFailed: 'transaction_failed',
  InvalidConfiguration: 'invalid_configuration',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

const ERROR_MESSAGES: Record<ErrorKind, string> = {
  no_credentials: 'no valid credentials available',
  token_exchange_failed: 'token request failed',
  static_token_cannot_refresh: 'static token cannot be refreshed',
  transport: 'transport error',
  timeout: 'request timed out',
  cancelled: 'request cancelled',
  circuit_open: 'circuit breaker is open',
  request_interceptor_failed: 'request interceptor failed',
  response_interceptor_failed: 'response interceptor failed',
  cache_disabled: 'cache disabled',
  cache_key_not_found: 'key not found',
  cache_entry_expired: 'entry expired',
  cache_not_found_in_any: 'key not found in any cache',
  unsupported_cache_type: 'unsupported cache type',
  unsupported_resource: 'unsupported resource type',
  unsupported_operation: 'unsupported operation type',
  invalid_operation_data: 'invalid data type',
  transaction_failed: 'transaction failed',
  invalid_configuration: 'invalid configuration',
};

export function describeErrorKind(kind: ErrorKind): string {
  return ERROR_MESSAGES[kind];
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface PipelineErrorOptions {
  detail?: string;
  cause?: unknown;
  /** Replaces the `<canonical>: <detail>` message. */
  message?: string;
}

export class PipelineError extends Error {
  readonly kind: ErrorKind;
  readonly detail?: string;
  override readonly cause?: unknown;

  constructor(kind: ErrorKind, options: PipelineErrorOptions = {}) {
    const base = ERROR_MESSAGES[kind];
    const detailed = options.detail ? `${base}: ${options.detail}` : base;
    super(options.message ?? detailed);
    this.name = 'PipelineError';
    this.kind = kind;
    this.detail = options.detail;
    this.cause = options.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function isPipelineError(
  error: unknown,
  kind?: ErrorKind
): error is PipelineError {
  if (!(error instanceof PipelineError)) return false;
  return kind === undefined || error.kind === kind;
}

/**
 * Walks the `cause` chain (interceptor failures wrap the original error)
 * looking for `kind`.
 */
export function findPipelineError(
  error: unknown,
  kind: ErrorKind
): PipelineError | undefined {
  let current: unknown = error;
  for (let depth = 0; current !== undefined && depth < 8; depth += 1) {
    if (isPipelineError(current, kind)) return current;
    current = current instanceof Error ? current.cause : undefined;
  }
  return undefined;
}

export type AuthenticationErrorKind =
  | typeof ErrorKind.NoCredentials
  | typeof ErrorKind.TokenExchangeFailed
  | typeof ErrorKind.StaticTokenCannotRefresh;

export interface AuthenticationErrorOptions extends PipelineErrorOptions {
  status?: number;
  oauthError?: string;
  oauthErrorDescription?: string;
}

export class AuthenticationError extends PipelineError {
  readonly status?: number;
  readonly oauthError?: string;
  readonly oauthErrorDescription?: string;

  constructor(
    kind: AuthenticationErrorKind,
    options: AuthenticationErrorOptions = {}
  ) {
    super(kind, options);
    this.name = 'AuthenticationError';
    this.status = options.status;
    this.oauthError = options.oauthError;
    this.oauthErrorDescription = options.oauthErrorDescription;
  }

  static noCredentials(): AuthenticationError {
    return new AuthenticationError(ErrorKind.NoCredentials);
  }

  /**
   * Builds the error for a non-2xx token endpoint reply, keeping the upstream
   * fields verbatim.
   */
  static fromTokenResponse(
    status: number,
    oauthError?: string,
    description?: string
  ): AuthenticationError {
    const parts = [`status ${status}`];
    if (oauthError) parts.push(oauthError);
    if (description) parts.push(description);
    return new AuthenticationError(ErrorKind.TokenExchangeFailed, {
      detail: parts.join(' - '),
      status,
      oauthError,
      oauthErrorDescription: description,
    });
  }
}

export class TransportError extends PipelineError {
  constructor(cause: unknown) {
    super(ErrorKind.Transport, { detail: errorMessage(cause), cause });
    this.name = 'TransportError';
  }
}

export class TimeoutError extends PipelineError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(ErrorKind.Timeout, { detail: `after ${timeoutMs}ms` });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class CancelledError extends PipelineError {
  constructor(cause?: unknown) {
    super(ErrorKind.Cancelled, { cause });
    this.name = 'CancelledError';
  }
}

export class CircuitOpenError extends PipelineError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super(ErrorKind.CircuitOpen);
    this.name = 'CircuitOpenError';
    this.retryAfterMs = retryAfterMs;
  }
}

export type InterceptorPhase = 'request' | 'response';

export class InterceptorError extends PipelineError {
  readonly phase: InterceptorPhase;

  constructor(phase: InterceptorPhase, cause: unknown) {
    const kind =
      phase === 'request'
        ? ErrorKind.RequestInterceptorFailed
        : ErrorKind.ResponseInterceptorFailed;
    super(kind, { detail: errorMessage(cause), cause });
    this.name = 'InterceptorError';
    this.phase = phase;
  }
}

export type CacheErrorKind =
  | typeof ErrorKind.CacheDisabled
  | typeof ErrorKind.CacheKeyNotFound
  | typeof ErrorKind.CacheEntryExpired
  | typeof ErrorKind.CacheNotFoundInAny
  | typeof ErrorKind.UnsupportedCacheType;

export class CacheError extends PipelineError {
  readonly key?: string;

  constructor(
    kind: CacheErrorKind,
    options: PipelineErrorOptions & { key?: string } = {}
  ) {
    super(kind, options);
    this.name = 'CacheError';
    this.key = options.key;
  }
}

export type BatchOperationErrorKind =
  | typeof ErrorKind.UnsupportedResource
  | typeof ErrorKind.UnsupportedOperation
  | typeof ErrorKind.InvalidOperationData;

/** Failure of one batch operation, reported in that operation's result. */
export class BatchOperationError extends PipelineError {
  readonly operationId: string;

  constructor(
    kind: BatchOperationErrorKind,
    operationId: string,
    options: PipelineErrorOptions = {}
  ) {
    super(kind, options);
    this.name = 'BatchOperationError';
    this.operationId = operationId;
  }

  static unsupportedResource(
    operationId: string,
    resource: string
  ): BatchOperationError {
    return new BatchOperationError(ErrorKind.UnsupportedResource, operationId, {
      detail: resource,
    });
  }

  static unsupportedOperation(
    operationId: string,
    type: string
  ): BatchOperationError {
    return new BatchOperationError(
      ErrorKind.UnsupportedOperation,
      operationId,
      { detail: type }
    );
  }

  static invalidData(
    operationId: string,
    resource: string,
    type: string,
    cause?: unknown
  ): BatchOperationError {
    return new BatchOperationError(
      ErrorKind.InvalidOperationData,
      operationId,
      {
        detail: `${resource} ${type}`,
        message: `invalid data type for ${resource} operation: ${type}`,
        cause,
      }
    );
  }
}

export class ConfigurationError extends PipelineError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(ErrorKind.InvalidConfiguration, { detail: issues.join('; ') });
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

// ============================================================================
// REST error documents
// ============================================================================

export const ErrorCode = {
  ServiceUnavailable: 10001,
  NotAuthenticated: 10002,
  NotAuthorized: 10003,
  BadRequest: 10005,
  UnprocessableEntity: 10008,
  NotFound: 10010,
  TooManyRequests: 10013,
  UniquenessError: 10016,
  InvalidRelation: 10020,
} as const;

export class ApiError extends Error {
  readonly code: number;
  readonly title: string;
  readonly detail: string;

  constructor(code: number, title: string, detail: string) {
    super(`${title}: ${detail} (code: ${code})`);
    this.name = 'ApiError';
    this.code = code;
    this.title = title;
    this.detail = detail;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ResponseError extends Error {
  readonly statusCode: number;
  readonly errors: ApiError[];

  constructor(statusCode: number, errors: ApiError[]) {
    super(ResponseError.describe(errors));
    this.name = 'ResponseError';
    this.statusCode = statusCode;
    this.errors = errors;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  firstError(): ApiError | undefined {
    return this.errors[0];
  }

  private static describe(errors: ApiError[]): string {
    if (errors.length === 0) return 'unknown error';
    if (errors.length === 1) return errors[0].message;
    return `multiple errors: ${errors.map((e) => e.message).join(', ')}`;
  }
}

const ApiErrorSchema = z.object({
  code: z.number().int(),
  title: z.string(),
  detail: z.string().default(''),
});

export const ErrorDocumentSchema = z.object({
  errors: z.array(ApiErrorSchema),
});

/**
 * Parses a REST error document. Returns `undefined` when the body is not JSON
 * or does not have the `{errors: [...]}` shape.
 */
export function parseResponseError(
  body: Uint8Array | string,
  statusCode = 0
): ResponseError | undefined {
  const text =
    typeof body === 'string' ? body : new TextDecoder().decode(body);
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = ErrorDocumentSchema.safeParse(json);
  if (!parsed.success) return undefined;
  return new ResponseError(
    statusCode,
    parsed.data.errors.map((e) => new ApiError(e.code, e.title, e.detail))
  );
}

function hasCode(error: unknown, code: number): boolean {
  if (error instanceof ApiError) return error.code === code;
  if (error instanceof ResponseError) return error.firstError()?.code === code;
  return false;
}

export const isNotFound = (error: unknown): boolean =>
  hasCode(error, ErrorCode.NotFound);

export const isUnauthorized = (error: unknown): boolean =>
  hasCode(error, ErrorCode.NotAuthenticated);

export const isForbidden = (error: unknown): boolean =>
  hasCode(error, ErrorCode.NotAuthorized);
