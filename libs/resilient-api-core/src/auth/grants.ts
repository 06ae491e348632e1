/** Password-grant client id used when no explicit client is configured. */
export const DEFAULT_PASSWORD_CLIENT_ID = 'cf';

export interface Credentials {
  /** API endpoint; the token URL defaults to `<apiEndpoint>/oauth/token`. */
  apiEndpoint?: string;
  tokenUrl?: string;
  clientId?: string;
  clientSecret?: string;
  username?: string;
  password?: string;
  refreshToken?: string;
  /** Statically injected bearer token. */
  accessToken?: string;
  accessTokenExpiresAt?: Date;
  scopes?: string[];
}

export interface PasswordGrant {
  type: 'password';
  username: string;
  password: string;
  clientId: string;
  clientSecret: string;
}

export type GrantStrategy =
  | {
      type: 'static';
      accessToken: string;
      expiresAt?: Date;
      fallback?: PasswordGrant;
    }
  | { type: 'client_credentials'; clientId: string; clientSecret: string }
  | PasswordGrant
  | {
      type: 'refresh_token';
      refreshToken: string;
      clientId?: string;
      clientSecret?: string;
    }
  | { type: 'none' };

const present = (value: string | undefined): value is string =>
  value !== undefined && value !== '';

/**
 * Picks exactly one grant by precedence: static token with password fallback,
 * static token, client credentials, password, refresh token, none.
 */
export function selectGrantStrategy(credentials: Credentials): GrantStrategy {
  const {
    accessToken,
    username,
    password,
    clientId,
    clientSecret,
    refreshToken,
  } = credentials;
  const hasPassword = present(username) && present(password);

  if (present(accessToken)) {
    return {
      type: 'static',
      accessToken,
      expiresAt: credentials.accessTokenExpiresAt,
      fallback: hasPassword
        ? {
            type: 'password',
            username,
            password,
            clientId: DEFAULT_PASSWORD_CLIENT_ID,
            clientSecret: '',
          }
        : undefined,
    };
  }

  if (present(clientId) && present(clientSecret)) {
    return { type: 'client_credentials', clientId, clientSecret };
  }

  if (hasPassword) {
    return {
      type: 'password',
      username,
      password,
      clientId: present(clientId) ? clientId : DEFAULT_PASSWORD_CLIENT_ID,
      clientSecret: clientSecret ?? '',
    };
  }

  if (present(refreshToken)) {
    return {
      type: 'refresh_token',
      refreshToken,
      clientId: present(clientId) ? clientId : undefined,
      clientSecret,
    };
  }

  return { type: 'none' };
}

export function resolveTokenUrl(
  credentials: Credentials
): string | undefined {
  if (credentials.tokenUrl) return credentials.tokenUrl;
  if (!credentials.apiEndpoint) return undefined;
  return `${credentials.apiEndpoint.replace(/\/+$/, '')}/oauth/token`;
}
