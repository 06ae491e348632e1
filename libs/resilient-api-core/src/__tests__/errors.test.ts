import { describe, expect, it } from 'vitest';
import {
  ApiError,
  AuthenticationError,
  CacheError,
  ConfigurationError,
  ErrorCode,
  ErrorKind,
  PipelineError,
  ResponseError,
  TimeoutError,
  isForbidden,
  isNotFound,
  isPipelineError,
  isUnauthorized,
  parseResponseError,
} from '../errors';
import { encodeJson } from '../request';

describe('PipelineError', () => {
  it('formats the canonical message with optional detail', () => {
    expect(new PipelineError(ErrorKind.CacheDisabled).message).toBe(
      'cache disabled'
    );
    expect(new TimeoutError(250).message).toBe(
      'request timed out: after 250ms'
    );
    const cacheError = new CacheError(ErrorKind.CacheKeyNotFound, {
      key: 'GET:/v3/apps',
    });
    expect(cacheError).toMatchObject({
      message: 'key not found',
      key: 'GET:/v3/apps',
    });
    const configError = new ConfigurationError([
      'apiEndpoint: Required',
      'timeoutMs: Expected number',
    ]);
    expect(configError.message).toBe(
      'invalid configuration: apiEndpoint: Required; timeoutMs: Expected number'
    );
  });

  it('discriminates by kind across subclasses', () => {
    const error = AuthenticationError.noCredentials();

    expect(error).toBeInstanceOf(PipelineError);
    expect(isPipelineError(error)).toBe(true);
    expect(isPipelineError(error, ErrorKind.NoCredentials)).toBe(true);
    expect(isPipelineError(error, ErrorKind.Transport)).toBe(false);
    expect(isPipelineError(new Error('plain'))).toBe(false);
  });

  it('omits absent OAuth fields from the token failure detail', () => {
    expect(AuthenticationError.fromTokenResponse(500).message).toBe(
      'token request failed: status 500'
    );
  });
});

describe('REST errors', () => {
  it('formats a single API error', () => {
    const error = new ApiError(
      ErrorCode.NotFound,
      'CF-ResourceNotFound',
      'App not found'
    );

    expect(error.message).toBe(
      'CF-ResourceNotFound: App not found (code: 10010)'
    );
    expect(isNotFound(error)).toBe(true);
    expect(isUnauthorized(error)).toBe(false);
  });

  it('summarises multiple errors', () => {
    const error = new ResponseError(422, [
      new ApiError(
        ErrorCode.UnprocessableEntity,
        'CF-UnprocessableEntity',
        'name is taken'
      ),
      new ApiError(
        ErrorCode.UniquenessError,
        'CF-UniquenessError',
        'duplicate route'
      ),
    ]);

    expect(error.message).toBe(
      'multiple errors: ' +
        'CF-UnprocessableEntity: name is taken (code: 10008), ' +
        'CF-UniquenessError: duplicate route (code: 10016)'
    );
    expect(error.firstError()?.code).toBe(10008);
    expect(new ResponseError(500, []).message).toBe('unknown error');
  });

  it('parses an error document', () => {
    const body = encodeJson({
      errors: [
        {
          code: 10003,
          title: 'CF-NotAuthorized',
          detail: 'You are not authorized to perform the requested action',
        },
      ],
    });

    const parsed = parseResponseError(body, 403);

    expect(parsed).toBeInstanceOf(ResponseError);
    expect(parsed?.statusCode).toBe(403);
    expect(parsed?.message).toBe(
      'CF-NotAuthorized: ' +
        'You are not authorized to perform the requested action (code: 10003)'
    );
    expect(isForbidden(parsed)).toBe(true);
  });

  it('returns undefined for bodies that are not error documents', () => {
    expect(parseResponseError('not json')).toBeUndefined();
    expect(parseResponseError('{"message":"oops"}')).toBeUndefined();
  });
});
