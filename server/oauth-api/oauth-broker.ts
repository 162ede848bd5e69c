/**
 * OAuth Broker
 *
 * Dispatches authentication requests to the registered provider
 * authenticators, completes provider callbacks, and serves token lookup and
 * invalidation for the current subject.
 *
 * The broker keeps no per-request state: everything the callback needs is
 * carried by the signed state parameter. Each flow gets an id; the caller
 * keeps it with the browser session and hands the pending ids back on
 * callback, so a state only completes in the browser that started it.
 */

import { randomBytes, type KeyObject } from 'crypto';
import type { AuthenticatorProtocol, OAuthToken, Subject } from '../providers/provider-interface.js';
import type { AuthenticatorRegistry } from '../providers/provider-registry.js';
import { isScmError, type PersonalAccessTokenManager } from '../scm/personal-access-token.js';
import { logger } from '../observability/logger.js';
import { decodeCallbackState, encodeCallbackState, type CallbackState } from './callback-state.js';
import { BadRequestError, OAuthAuthenticationError, ServerError, UnauthorizedError } from './errors.js';
import { ACCESS_DENIED, appendErrorCode } from './redirect-url.js';

/** Path of the broker endpoints below the base URL */
export const OAUTH_PATH = '/oauth';

export interface LinkParameter {
  name: string;
  required: boolean;
  defaultValue: string;
  description?: string;
}

export interface Link {
  href: string;
  rel: string;
  method: 'GET' | 'POST' | 'DELETE';
  produces?: string;
  consumes?: string;
  parameters: LinkParameter[];
}

export interface OAuthAuthenticatorDescriptor {
  name: string;
  endpointUrl: string;
  protocol: AuthenticatorProtocol;
  links: Link[];
}

export interface AuthenticateRequest {
  providerName: string | undefined;
  scopes?: string[];
  redirectAfterLogin?: string;
}

/** Where to send the user agent next (always answered with 307) */
export interface RedirectResult {
  location: string;
  /** Flow the redirect belongs to */
  flowId: string;
}

export interface CallbackContext {
  /** Flow ids started in the calling browser session */
  pendingFlowIds: readonly string[];
  /** Provider error values; defaults to the `error` query parameters */
  errorValues?: string[];
}

export interface OAuthBrokerOptions {
  registry: AuthenticatorRegistry;
  personalAccessTokenManager: PersonalAccessTokenManager;
  /** Key the callback state is signed with */
  stateKey: KeyObject;
  /** Lifetime of a callback state, jose time span */
  stateTtl: string;
  baseUrl: string;
  accessDeniedErrorPage: string;
  defaultRedirectAfterLogin: string;
}

export interface OAuthBroker {
  authenticate(subject: Subject, request: AuthenticateRequest): Promise<RedirectResult>;
  callback(requestUrl: URL, context: CallbackContext): Promise<RedirectResult>;
  getRegisteredAuthenticators(baseUrl?: string): OAuthAuthenticatorDescriptor[];
  getToken(subject: Subject, providerName: string | undefined): Promise<OAuthToken>;
  invalidateToken(subject: Subject, providerName: string | undefined): Promise<void>;
}

export function createOAuthBroker(options: OAuthBrokerOptions): OAuthBroker {
  const { registry, personalAccessTokenManager, stateKey, stateTtl, baseUrl } = options;
  const callbackUrl = `${baseUrl}${OAUTH_PATH}/callback`;

  function deniedRedirect({ flowId, redirectAfterLogin }: CallbackState): RedirectResult {
    if (!redirectAfterLogin) {
      return { location: options.accessDeniedErrorPage, flowId };
    }
    return { location: appendErrorCode(redirectAfterLogin, baseUrl), flowId };
  }

  return {
    async authenticate(subject, { providerName, scopes = [], redirectAfterLogin }) {
      const { authenticator } = registry.require(providerName);
      const flowId = randomBytes(16).toString('hex');

      const state = await encodeCallbackState(
        {
          flowId,
          providerName: authenticator.name,
          scopes,
          redirectAfterLogin,
          userId: subject.userId,
          userName: subject.userName,
        },
        stateKey,
        stateTtl
      );

      const location = await authenticator.getAuthenticateUrl({ callbackUrl, scopes, state });
      logger.info('Redirecting to provider authorization', { provider: authenticator.name, userId: subject.userId });
      return { location, flowId };
    },

    async callback(requestUrl, { pendingFlowIds, errorValues }) {
      const state = await decodeCallbackState(requestUrl.searchParams.get('state'), stateKey);
      if (!pendingFlowIds.includes(state.flowId)) {
        logger.warn('OAuth callback for a flow not started in this session', {
          provider: state.providerName,
          userId: state.userId,
        });
        throw new BadRequestError('OAuth flow was not started in this browser session');
      }

      const errors = errorValues ?? requestUrl.searchParams.getAll('error');

      if (state.redirectAfterLogin && errors.includes(ACCESS_DENIED)) {
        logger.info('User denied access at provider', { provider: state.providerName, userId: state.userId });
        return deniedRedirect(state);
      }

      const { authenticator } = registry.require(state.providerName);

      try {
        await authenticator.callback({
          requestUrl,
          scopes: state.scopes,
          subject: { userId: state.userId, userName: state.userName },
        });
      } catch (err) {
        if (err instanceof OAuthAuthenticationError) {
          logger.warn('OAuth callback failed', { provider: authenticator.name, error: err.message });
          return deniedRedirect(state);
        }
        throw err;
      }

      return { location: state.redirectAfterLogin || options.defaultRedirectAfterLogin, flowId: state.flowId };
    },

    getRegisteredAuthenticators(requestBaseUrl = baseUrl) {
      const authenticateHref = `${requestBaseUrl}${OAUTH_PATH}/authenticate`;

      return registry.list().map(({ name, protocol, authenticator }): OAuthAuthenticatorDescriptor => ({
        name,
        protocol,
        endpointUrl: authenticator.getEndpointUrl(),
        links: [
          {
            href: authenticateHref,
            rel: 'Authenticate URL',
            method: 'GET',
            parameters: [
              { name: 'oauth_provider', required: true, defaultValue: name },
              { name: 'mode', required: true, defaultValue: 'federated_login' },
            ],
          },
        ],
      }));
    },

    async getToken(subject, providerName) {
      const { authenticator } = registry.require(providerName);

      let token: OAuthToken | undefined;
      try {
        token = (await authenticator.getToken(subject.userId)) ?? (await authenticator.getToken(subject.userName));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ServerError(message, { cause: err });
      }

      if (!token) {
        throw new UnauthorizedError(`OAuth token for user ${subject.userId} was not found`);
      }
      return token;
    },

    async invalidateToken(subject, providerName) {
      const { authenticator } = registry.require(providerName);
      const notFound = () => new UnauthorizedError(`OAuth token for provider ${authenticator.name} was not found`);

      let revoked: boolean;
      try {
        const pat = await personalAccessTokenManager.get(subject, authenticator.name);
        if (!pat) {
          throw notFound();
        }
        revoked = await authenticator.invalidateToken(pat.token);
      } catch (err) {
        if (err instanceof UnauthorizedError) {
          throw err;
        }
        if (!isScmError(err)) {
          logger.warn('Token invalidation failed', {
            provider: authenticator.name,
            error: err instanceof Error ? err.message : String(err),
          });
        }
        throw notFound();
      }

      if (!revoked) {
        throw notFound();
      }
      logger.info('OAuth token invalidated', { provider: authenticator.name, userId: subject.userId });
    },
  };
}
