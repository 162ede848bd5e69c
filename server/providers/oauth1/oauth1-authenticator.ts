/**
 * OAuth1 Authenticator
 *
 * Three-legged OAuth 1.0a flow (request token → user authorization → access
 * token). OAuth1 has no state parameter, so the broker state rides on the
 * oauth_callback URL and comes back as a query parameter of the callback.
 */

import type { OAuthAuthenticator, OAuthToken } from '../provider-interface.js';
import type { TokenStore } from '../token-store.js';
import { OAuthAuthenticationError } from '../../oauth-api/errors.js';
import { logger } from '../../observability/logger.js';
import { buildAuthorizationHeader, type OAuth1Credentials } from './signature.js';

export interface OAuth1ProviderConfig {
  name: string;
  endpointUrl: string;
  requestTokenUrl: string;
  authorizeUrl: string;
  accessTokenUrl: string;
  consumerKey: string;
  consumerSecret?: string;
  /** PEM key; switches signing to RSA-SHA1 */
  privateKey?: string;
}

export interface OAuth1AuthenticatorDeps {
  tokenStore: TokenStore;
  /** Defaults to Date.now */
  now?: () => number;
}

/** How long an issued request token may wait for the user */
const REQUEST_TOKEN_TTL_MS = 10 * 60 * 1000;

interface PendingRequestToken {
  secret: string;
  expiresAt: number;
}

export function createOAuth1Authenticator(
  config: OAuth1ProviderConfig,
  { tokenStore, now = Date.now }: OAuth1AuthenticatorDeps
): OAuthAuthenticator {
  const pending = new Map<string, PendingRequestToken>();

  const consumer: OAuth1Credentials = {
    consumerKey: config.consumerKey,
    consumerSecret: config.consumerSecret,
    privateKey: config.privateKey,
  };

  function sweepExpired(): void {
    const current = now();
    for (const [token, entry] of pending) {
      if (entry.expiresAt < current) {
        pending.delete(token);
      }
    }
  }

  async function postForToken(
    url: string,
    credentials: OAuth1Credentials,
    oauthParams: Record<string, string>
  ): Promise<URLSearchParams> {
    const authorization = buildAuthorizationHeader(credentials, {
      method: 'POST',
      url,
      oauthParams,
      timestamp: Math.floor(now() / 1000),
    });

    let res: Response;
    try {
      res = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: authorization,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new OAuthAuthenticationError(`Network error contacting ${config.name}: ${message}`);
    }

    const text = await res.text();
    if (!res.ok) {
      logger.error('OAuth1 token request failed', { provider: config.name, status: res.status });
      throw new OAuthAuthenticationError(`${config.name} token request failed (${res.status}): ${text}`);
    }

    const answer = new URLSearchParams(text);
    if (!answer.get('oauth_token')) {
      throw new OAuthAuthenticationError(`${config.name} token response has no oauth_token`);
    }
    return answer;
  }

  return {
    name: config.name,
    protocol: 'oauth1',

    getEndpointUrl: () => config.endpointUrl,

    getAuthenticateUrl: async ({ callbackUrl, state }) => {
      sweepExpired();

      const oauthCallback = new URL(callbackUrl);
      oauthCallback.searchParams.set('state', state);

      const answer = await postForToken(config.requestTokenUrl, consumer, {
        oauth_callback: oauthCallback.toString(),
      });
      const requestToken = answer.get('oauth_token') ?? '';

      pending.set(requestToken, {
        secret: answer.get('oauth_token_secret') ?? '',
        expiresAt: now() + REQUEST_TOKEN_TTL_MS,
      });

      const authorizeUrl = new URL(config.authorizeUrl);
      authorizeUrl.searchParams.set('oauth_token', requestToken);
      return authorizeUrl.toString();
    },

    callback: async ({ requestUrl, scopes, subject }) => {
      sweepExpired();

      const requestToken = requestUrl.searchParams.get('oauth_token');
      const verifier = requestUrl.searchParams.get('oauth_verifier');
      if (!requestToken || !verifier) {
        throw new OAuthAuthenticationError(`${config.name} callback is missing oauth_token or oauth_verifier`);
      }

      const entry = pending.get(requestToken);
      if (!entry) {
        throw new OAuthAuthenticationError(`Unknown or expired ${config.name} request token`);
      }
      pending.delete(requestToken);

      const answer = await postForToken(
        config.accessTokenUrl,
        { ...consumer, token: requestToken, tokenSecret: entry.secret },
        { oauth_verifier: verifier }
      );

      const token: OAuthToken = { token: answer.get('oauth_token') ?? '', scope: scopes.join(' ') };
      const tokenSecret = answer.get('oauth_token_secret');
      if (tokenSecret) {
        token.tokenSecret = tokenSecret;
      }
      await tokenStore.put(config.name, subject.userId, token);
      if (subject.userName && subject.userName !== subject.userId) {
        await tokenStore.put(config.name, subject.userName, token);
      }

      logger.info('OAuth1 flow completed', { provider: config.name, userId: subject.userId });
    },

    getToken: owner => tokenStore.get(config.name, owner),

    // No standard revocation endpoint in OAuth 1.0a
    invalidateToken: token => tokenStore.remove(config.name, token),
  };
}
