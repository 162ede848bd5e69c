/**
 * Provider Catalog
 *
 * Endpoint presets for the source-control providers the broker knows, turned
 * into authenticators for whichever ones carry credentials in the config.
 */

import type { BrokerConfig } from '../config.js';
import type { OAuthAuthenticator } from './provider-interface.js';
import type { TokenStore } from './token-store.js';
import { AuthenticatorRegistry } from './provider-registry.js';
import { createOAuth1Authenticator } from './oauth1/oauth1-authenticator.js';
import { createOAuth2Authenticator } from './oauth2/oauth2-authenticator.js';

export interface ConfiguredAuthenticators {
  oauth1: OAuthAuthenticator[];
  oauth2: OAuthAuthenticator[];
}

export function createConfiguredAuthenticators(
  providers: BrokerConfig['providers'],
  tokenStore: TokenStore
): ConfiguredAuthenticators {
  const oauth1: OAuthAuthenticator[] = [];
  const oauth2: OAuthAuthenticator[] = [];

  if (providers.github) {
    oauth2.push(
      createOAuth2Authenticator(
        {
          name: 'github',
          endpointUrl: 'https://github.com',
          authorizationUrl: 'https://github.com/login/oauth/authorize',
          tokenUrl: 'https://github.com/login/oauth/access_token',
          defaultScopes: ['repo', 'user', 'write:public_key'],
          ...providers.github,
        },
        { tokenStore }
      )
    );
  }

  if (providers.gitlab) {
    const { url, ...credentials } = providers.gitlab;
    oauth2.push(
      createOAuth2Authenticator(
        {
          name: 'gitlab',
          endpointUrl: url,
          authorizationUrl: `${url}/oauth/authorize`,
          tokenUrl: `${url}/oauth/token`,
          revocationUrl: `${url}/oauth/revoke`,
          defaultScopes: ['api', 'write_repository', 'openid'],
          ...credentials,
        },
        { tokenStore }
      )
    );
  }

  if (providers.bitbucket) {
    oauth2.push(
      createOAuth2Authenticator(
        {
          name: 'bitbucket',
          endpointUrl: 'https://bitbucket.org',
          authorizationUrl: 'https://bitbucket.org/site/oauth2/authorize',
          tokenUrl: 'https://bitbucket.org/site/oauth2/access_token',
          defaultScopes: ['repository', 'account'],
          ...providers.bitbucket,
        },
        { tokenStore }
      )
    );
  }

  if (providers.bitbucketServer) {
    const { url, consumerKey, privateKey } = providers.bitbucketServer;
    oauth1.push(
      createOAuth1Authenticator(
        {
          name: 'bitbucket-server',
          endpointUrl: url,
          requestTokenUrl: `${url}/plugins/servlet/oauth/request-token`,
          authorizeUrl: `${url}/plugins/servlet/oauth/authorize`,
          accessTokenUrl: `${url}/plugins/servlet/oauth/access-token`,
          consumerKey,
          privateKey,
        },
        { tokenStore }
      )
    );
  }

  return { oauth1, oauth2 };
}

export function createConfiguredRegistry(
  providers: BrokerConfig['providers'],
  tokenStore: TokenStore
): AuthenticatorRegistry {
  const { oauth1, oauth2 } = createConfiguredAuthenticators(providers, tokenStore);
  return AuthenticatorRegistry.fromAuthenticators(oauth1, oauth2);
}
