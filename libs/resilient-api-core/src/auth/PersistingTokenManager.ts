import { errorMessage } from '../errors';
import { noopLogger } from '../logging';
import type { Clock, Logger } from '../types';
import type { OAuth2TokenManager, TokenManager } from './OAuth2TokenManager';
import type { Token } from './token';

export interface TokenPersister {
  updateApiToken(
    apiDomain: string,
    accessToken: string,
    expiresAt: Date | undefined,
    refreshToken?: string
  ): Promise<void> | void;
}

export interface PersistingTokenManagerOptions {
  apiDomain: string;
  persister: TokenPersister;
  initialToken?: string;
  initialExpiry?: Date;
  logger?: Logger;
  clock?: Clock;
}

/**
 * Wraps an {@link OAuth2TokenManager} and hands every newly issued token to a
 * {@link TokenPersister}. Persistence failures are logged and never fail the
 * call.
 */
export class PersistingTokenManager implements TokenManager {
  private readonly apiDomain: string;
  private readonly persister: TokenPersister;
  private readonly logger: Logger;
  private readonly now: Clock;
  private lastPersisted?: { accessToken: string; expiresAt?: number };

  constructor(
    private readonly inner: OAuth2TokenManager,
    options: PersistingTokenManagerOptions
  ) {
    this.apiDomain = options.apiDomain;
    this.persister = options.persister;
    this.logger = options.logger ?? noopLogger;
    this.now = options.clock ?? Date.now;

    if (options.initialToken) {
      inner.setToken(options.initialToken, options.initialExpiry);
      this.lastPersisted = {
        accessToken: options.initialToken,
        expiresAt: options.initialExpiry?.getTime(),
      };
    }
  }

  async getToken(signal?: AbortSignal): Promise<string> {
    const token = await this.inner.getToken(signal);
    await this.persistIfChanged();
    return token;
  }

  async refreshToken(signal?: AbortSignal): Promise<void> {
    await this.inner.refreshToken(signal);
    await this.persistIfChanged();
  }

  /** Injected tokens are treated as already persisted. */
  setToken(accessToken: string, expiresAt?: Date): void {
    this.inner.setToken(accessToken, expiresAt);
    this.lastPersisted = { accessToken, expiresAt: expiresAt?.getTime() };
  }

  getTokenExpiry(): Date | undefined {
    return this.inner.currentToken()?.expiresAt;
  }

  /**
   * True when the current token expires within `withinMs` (or there is no
   * usable token).
   */
  isTokenExpiringSoon(withinMs: number): boolean {
    const token = this.inner.currentToken();
    if (!token || token.accessToken === '') return true;
    if (!token.expiresAt) return false;
    return token.expiresAt.getTime() - this.now() <= withinMs;
  }

  private async persistIfChanged(): Promise<void> {
    const current = this.inner.currentToken();
    if (!current || !this.hasChanged(current)) return;

    this.lastPersisted = {
      accessToken: current.accessToken,
      expiresAt: current.expiresAt?.getTime(),
    };
    try {
      await this.persister.updateApiToken(
        this.apiDomain,
        current.accessToken,
        current.expiresAt,
        current.refreshToken
      );
      this.logger.debug('auth.token.persisted', { apiDomain: this.apiDomain });
    } catch (error) {
      this.logger.warn('auth.token.persist.failed', {
        apiDomain: this.apiDomain,
        error: errorMessage(error),
      });
    }
  }

  private hasChanged(token: Token): boolean {
    const last = this.lastPersisted;
    if (!last) return true;
    return (
      last.accessToken !== token.accessToken ||
      last.expiresAt !== token.expiresAt?.getTime()
    );
  }
}
