import { z } from 'zod';

export const TOKEN_EXPIRATION_BUFFER_MS = 30_000;

export interface Token {
  readonly accessToken: string;
  readonly refreshToken?: string;
  readonly tokenType: string;
  /** Absent for tokens with no known expiry; those are treated as valid. */
  readonly expiresAt?: Date;
}

/**
 * A token is usable while `now` is earlier than its expiry minus
 * {@link TOKEN_EXPIRATION_BUFFER_MS}, so a request never leaves with a token
 * that expires in flight.
 */
export function isTokenValid(
  token: Token | undefined,
  now: number = Date.now()
): token is Token {
  if (!token || token.accessToken === '') return false;
  if (!token.expiresAt) return true;
  return now < token.expiresAt.getTime() - TOKEN_EXPIRATION_BUFFER_MS;
}

export function createToken(fields: Token): Token {
  return Object.freeze({ ...fields });
}

/** Holds the current token; tokens are replaced wholesale, never mutated. */
export class TokenStore {
  private current?: Token;

  get(): Token | undefined {
    return this.current;
  }

  set(token: Token): void {
    this.current = createToken(token);
  }

  clear(): void {
    this.current = undefined;
  }
}

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  expires_in: z.number().optional(),
  token_type: z.string().default('bearer'),
  scope: z.string().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

export const TokenErrorResponseSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
});

export function tokenFromResponse(
  response: TokenResponse,
  receivedAt: number
): Token {
  return createToken({
    accessToken: response.access_token,
    refreshToken: response.refresh_token || undefined,
    tokenType: response.token_type,
    expiresAt:
      response.expires_in !== undefined
        ? new Date(receivedAt + response.expires_in * 1000)
        : undefined,
  });
}
