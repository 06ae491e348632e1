import {
  OAuth2TokenManager,
  type OAuth2TokenManagerOptions,
} from './OAuth2TokenManager';

export const UAA_SCOPES = ['cloud_controller.read', 'cloud_controller.write'];

export const uaaTokenUrl = (uaaUrl: string): string =>
  `${uaaUrl.replace(/\/+$/, '')}/oauth/token`;

/** Client-credentials manager against a UAA server. */
export function createUaaTokenManager(
  uaaUrl: string,
  clientId: string,
  clientSecret: string,
  options?: OAuth2TokenManagerOptions
): OAuth2TokenManager {
  return new OAuth2TokenManager(
    {
      tokenUrl: uaaTokenUrl(uaaUrl),
      clientId,
      clientSecret,
      scopes: [...UAA_SCOPES],
    },
    options
  );
}

/**
 * Password-grant manager against a UAA server. Client id and secret
 * authenticate the grant; with both present the client-credentials grant
 * takes precedence.
 */
export function createUaaPasswordTokenManager(
  uaaUrl: string,
  clientId: string,
  clientSecret: string,
  username: string,
  password: string,
  options?: OAuth2TokenManagerOptions
): OAuth2TokenManager {
  return new OAuth2TokenManager(
    {
      tokenUrl: uaaTokenUrl(uaaUrl),
      clientId,
      clientSecret,
      username,
      password,
      scopes: [...UAA_SCOPES],
    },
    options
  );
}
