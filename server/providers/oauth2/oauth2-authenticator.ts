/**
 * OAuth2 Authenticator
 *
 * Authorization-code flow against a single OAuth2 provider. Tokens obtained in
 * the callback are kept in the shared token store under both the user id and
 * the user name of the subject.
 */

import type { OAuthAuthenticator, OAuthToken } from '../provider-interface.js';
import type { TokenStore } from '../token-store.js';
import { OAuthAuthenticationError } from '../../oauth-api/errors.js';
import { logger } from '../../observability/logger.js';
import { buildOAuthUrl } from './url-builder.js';
import { performTokenExchange, performTokenRevocation, type StandardTokenResponse } from './token-exchange-helper.js';

export interface OAuth2ProviderConfig {
  name: string;
  /** Base URL of the provider, reported in the provider directory */
  endpointUrl: string;
  authorizationUrl: string;
  tokenUrl: string;
  /** RFC 7009 revocation endpoint; without it tokens are only dropped locally */
  revocationUrl?: string;
  clientId: string;
  clientSecret: string;
  defaultScopes?: string[];
}

export interface OAuth2AuthenticatorDeps {
  tokenStore: TokenStore;
}

export function createOAuth2Authenticator(
  config: OAuth2ProviderConfig,
  { tokenStore }: OAuth2AuthenticatorDeps
): OAuthAuthenticator {
  return {
    name: config.name,
    protocol: 'oauth2',

    getEndpointUrl: () => config.endpointUrl,

    getAuthenticateUrl: async params =>
      buildOAuthUrl(
        {
          authorizationUrl: config.authorizationUrl,
          clientId: config.clientId,
          defaultScopes: config.defaultScopes,
        },
        params
      ),

    callback: async ({ requestUrl, scopes, subject }) => {
      const error = requestUrl.searchParams.get('error');
      if (error) {
        throw new OAuthAuthenticationError(`${config.name} authorization failed: ${error}`);
      }

      const code = requestUrl.searchParams.get('code');
      if (!code) {
        throw new OAuthAuthenticationError(`No authorization code received from ${config.name}`);
      }

      // Must match the redirect_uri sent on the authorization request, i.e. without the provider's query
      const redirectUri = `${requestUrl.origin}${requestUrl.pathname}`;

      let tokens: StandardTokenResponse;
      try {
        tokens = await performTokenExchange(
          {
            provider: config.name,
            tokenUrl: config.tokenUrl,
            clientId: config.clientId,
            clientSecret: config.clientSecret,
          },
          { code, redirectUri }
        );
      } catch (err) {
        throw new OAuthAuthenticationError(err instanceof Error ? err.message : String(err));
      }

      const token: OAuthToken = {
        token: tokens.access_token,
        scope: tokens.scope ?? scopes.join(' '),
      };
      await tokenStore.put(config.name, subject.userId, token);
      if (subject.userName && subject.userName !== subject.userId) {
        await tokenStore.put(config.name, subject.userName, token);
      }

      logger.info('OAuth2 flow completed', { provider: config.name, userId: subject.userId });
    },

    getToken: owner => tokenStore.get(config.name, owner),

    invalidateToken: async token => {
      if (config.revocationUrl) {
        const revoked = await performTokenRevocation(
          {
            provider: config.name,
            revocationUrl: config.revocationUrl,
            clientId: config.clientId,
            clientSecret: config.clientSecret,
          },
          token
        );
        if (!revoked) {
          return false;
        }
      }

      return tokenStore.remove(config.name, token);
    },
  };
}
