import {
  AuthenticationError,
  CancelledError,
  ErrorKind,
  TransportError,
  errorMessage,
  isPipelineError,
} from '../errors';
import { noopLogger } from '../logging';
import { decodeText, encodeText, isSuccessStatus } from '../request';
import { fetchTransport } from '../transport/fetchTransport';
import type { Clock, HttpTransport, Logger, RawHttpResponse } from '../types';
import {
  DEFAULT_PASSWORD_CLIENT_ID,
  resolveTokenUrl,
  selectGrantStrategy,
  type Credentials,
  type GrantStrategy,
} from './grants';
import {
  TokenErrorResponseSchema,
  TokenResponseSchema,
  TokenStore,
  createToken,
  isTokenValid,
  tokenFromResponse,
  type Token,
} from './token';

export interface TokenManager {
  getToken(signal?: AbortSignal): Promise<string>;
  refreshToken(signal?: AbortSignal): Promise<void>;
  setToken(accessToken: string, expiresAt?: Date): void;
}

export interface OAuth2TokenManagerOptions {
  transport?: HttpTransport;
  logger?: Logger;
  clock?: Clock;
}

interface GrantClient {
  clientId: string;
  clientSecret: string;
}

type GrantRequest =
  | (GrantClient & { grantType: 'client_credentials' })
  | (GrantClient & {
      grantType: 'password';
      username: string;
      password: string;
    })
  | (GrantClient & { grantType: 'refresh_token'; refreshToken: string });

interface RefreshFlight {
  promise: Promise<Token>;
  controller: AbortController;
  waiters: number;
}

/**
 * OAuth2 token lifecycle for the pipeline. The grant strategy is chosen once
 * from the configured credentials; a refresh in progress is shared by every
 * caller that asks for a token while it runs.
 */
export class OAuth2TokenManager implements TokenManager {
  readonly strategy: GrantStrategy;
  readonly tokenUrl?: string;
  readonly scopes: string[];
  private readonly store = new TokenStore();
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly now: Clock;
  private inFlight?: RefreshFlight;

  constructor(
    credentials: Credentials,
    options: OAuth2TokenManagerOptions = {}
  ) {
    this.strategy = selectGrantStrategy(credentials);
    this.tokenUrl = resolveTokenUrl(credentials);
    this.scopes = credentials.scopes ?? [];
    this.transport = options.transport ?? fetchTransport;
    this.logger = options.logger ?? noopLogger;
    this.now = options.clock ?? Date.now;

    if (this.strategy.type === 'static') {
      this.store.set({
        accessToken: this.strategy.accessToken,
        tokenType: 'bearer',
        expiresAt: this.strategy.expiresAt,
      });
    } else if (credentials.refreshToken) {
      // Seeds the refresh path for any grant configured with a refresh token.
      this.store.set({
        accessToken: '',
        tokenType: 'bearer',
        refreshToken: credentials.refreshToken,
      });
    }
  }

  currentToken(): Token | undefined {
    return this.store.get();
  }

  async getToken(signal?: AbortSignal): Promise<string> {
    const current = this.store.get();
    if (isTokenValid(current, this.now())) {
      return current.accessToken;
    }
    const token = await this.refreshSingleFlight(signal);
    return token.accessToken;
  }

  async refreshToken(signal?: AbortSignal): Promise<void> {
    await this.refreshSingleFlight(signal);
  }

  setToken(accessToken: string, expiresAt?: Date): void {
    this.store.set({
      accessToken,
      tokenType: 'bearer',
      expiresAt,
      refreshToken: this.store.get()?.refreshToken,
    });
  }

  clearToken(): void {
    this.store.clear();
  }

  private refreshSingleFlight(signal?: AbortSignal): Promise<Token> {
    if (signal?.aborted) {
      return Promise.reject(new CancelledError(signal.reason));
    }
    let flight = this.inFlight;
    if (!flight || flight.controller.signal.aborted) {
      const controller = new AbortController();
      const started: RefreshFlight = {
        controller,
        waiters: 0,
        promise: this.performRefresh(controller.signal).finally(() => {
          if (this.inFlight === started) this.inFlight = undefined;
        }),
      };
      this.inFlight = started;
      flight = started;
    }
    return this.joinFlight(flight, signal);
  }

  /**
   * Waits on the shared exchange until the caller's own signal fires. The
   * exchange itself is aborted only once every caller waiting on it has left.
   */
  private joinFlight(
    flight: RefreshFlight,
    signal?: AbortSignal
  ): Promise<Token> {
    flight.waiters += 1;
    if (!signal) return flight.promise;

    return new Promise<Token>((resolve, reject) => {
      const onAbort = () => {
        flight.waiters -= 1;
        if (flight.waiters === 0) flight.controller.abort(signal.reason);
        reject(new CancelledError(signal.reason));
      };
      signal.addEventListener('abort', onAbort, { once: true });
      flight.promise.then(
        (token) => {
          signal.removeEventListener('abort', onAbort);
          resolve(token);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  private async performRefresh(signal?: AbortSignal): Promise<Token> {
    const storedRefresh = this.store.get()?.refreshToken;
    const primary = this.primaryGrant();

    if (storedRefresh && this.strategy.type !== 'refresh_token') {
      try {
        return await this.exchange(this.refreshGrant(storedRefresh), signal);
      } catch (error) {
        if (!primary || isPipelineError(error, ErrorKind.Cancelled)) {
          throw error;
        }
        this.logger.warn('auth.token.refresh.fallback', {
          grant: primary.grantType,
          error: errorMessage(error),
        });
      }
    }

    if (this.strategy.type === 'refresh_token') {
      const refreshToken = storedRefresh ?? this.strategy.refreshToken;
      return this.exchange(this.refreshGrant(refreshToken), signal);
    }
    if (primary) {
      return this.exchange(primary, signal);
    }
    if (this.strategy.type === 'static') {
      throw new AuthenticationError(ErrorKind.StaticTokenCannotRefresh);
    }
    throw AuthenticationError.noCredentials();
  }

  private primaryGrant(): GrantRequest | undefined {
    switch (this.strategy.type) {
      case 'client_credentials':
        return {
          grantType: 'client_credentials',
          clientId: this.strategy.clientId,
          clientSecret: this.strategy.clientSecret,
        };
      case 'password':
        return {
          grantType: 'password',
          clientId: this.strategy.clientId,
          clientSecret: this.strategy.clientSecret,
          username: this.strategy.username,
          password: this.strategy.password,
        };
      case 'static':
        return this.strategy.fallback
          ? {
              grantType: 'password',
              clientId: this.strategy.fallback.clientId,
              clientSecret: this.strategy.fallback.clientSecret,
              username: this.strategy.fallback.username,
              password: this.strategy.fallback.password,
            }
          : undefined;
      default:
        return undefined;
    }
  }

  private refreshGrant(refreshToken: string): GrantRequest {
    return { grantType: 'refresh_token', refreshToken, ...this.grantClient() };
  }

  private grantClient(): GrantClient {
    const strategy = this.strategy;
    switch (strategy.type) {
      case 'client_credentials':
      case 'password':
        return {
          clientId: strategy.clientId,
          clientSecret: strategy.clientSecret,
        };
      case 'refresh_token':
        if (strategy.clientId) {
          return {
            clientId: strategy.clientId,
            clientSecret: strategy.clientSecret ?? '',
          };
        }
        break;
      default:
        break;
    }
    return { clientId: DEFAULT_PASSWORD_CLIENT_ID, clientSecret: '' };
  }

  private async exchange(
    grant: GrantRequest,
    signal?: AbortSignal
  ): Promise<Token> {
    if (!this.tokenUrl) {
      throw AuthenticationError.noCredentials();
    }

    const form = new URLSearchParams({ grant_type: grant.grantType });
    if (grant.grantType === 'password') {
      form.set('username', grant.username);
      form.set('password', grant.password);
    } else if (grant.grantType === 'refresh_token') {
      form.set('refresh_token', grant.refreshToken);
    }
    if (this.scopes.length > 0) {
      form.set('scope', this.scopes.join(' '));
    }

    const basic = Buffer.from(
      `${grant.clientId}:${grant.clientSecret}`
    ).toString('base64');
    const controller = new AbortController();
    const onAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) throw new CancelledError(signal.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    this.logger.debug('auth.token.request', {
      grant: grant.grantType,
      tokenUrl: this.tokenUrl,
    });

    let raw: RawHttpResponse;
    try {
      raw = await this.transport(
        {
          method: 'POST',
          url: this.tokenUrl,
          headers: {
            'Content-Type': 'application/x-www-form-urlencoded',
            Accept: 'application/json',
            Authorization: `Basic ${basic}`,
          },
          body: encodeText(form.toString()),
        },
        controller.signal
      );
    } catch (error) {
      if (signal?.aborted) throw new CancelledError(signal.reason);
      throw new TransportError(error);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }

    const receivedAt = this.now();
    const text = decodeText(raw.body);
    const json = safeJson(text);

    if (!isSuccessStatus(raw.status)) {
      const upstream = TokenErrorResponseSchema.safeParse(json);
      const fields = upstream.success ? upstream.data : {};
      this.logger.warn('auth.token.error', {
        grant: grant.grantType,
        status: raw.status,
        error: fields.error,
      });
      throw AuthenticationError.fromTokenResponse(
        raw.status,
        fields.error,
        fields.error_description
      );
    }

    const parsed = TokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthenticationError(ErrorKind.TokenExchangeFailed, {
        detail: 'malformed token response',
        status: raw.status,
        cause: parsed.error,
      });
    }

    const issued = tokenFromResponse(parsed.data, receivedAt);
    // Keep the previous refresh token when the server does not rotate it.
    const token = issued.refreshToken
      ? issued
      : createToken({
          ...issued,
          refreshToken: this.store.get()?.refreshToken,
        });
    this.store.set(token);
    this.logger.info('auth.token.refreshed', {
      grant: grant.grantType,
      expiresAt: token.expiresAt?.toISOString(),
    });
    return token;
  }
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
