/**
 * OAuth Broker Tests
 *
 * Drives the broker against in-process fake authenticators and a fake
 * personal access token manager.
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { AuthenticatorRegistry } from '../providers/provider-registry.js';
import type { Subject } from '../providers/provider-interface.js';
import {
  ScmCommunicationError,
  ScmConfigurationPersistenceError,
  type PersonalAccessToken,
  type PersonalAccessTokenManager,
} from '../scm/personal-access-token.js';
import { createSigningKey } from '../tokens.js';
import { createFakeAuthenticator, type FakeAuthenticator } from '../test-helpers/fake-authenticator.js';
import { createOAuthBroker, type OAuthBroker } from './oauth-broker.js';
import { decodeCallbackState, encodeCallbackState } from './callback-state.js';
import { BadRequestError, NotFoundError, OAuthAuthenticationError, ServerError, UnauthorizedError } from './errors.js';

const stateKey = createSigningKey('test-secret-for-broker');
const subject: Subject = { userId: 'user-1', userName: 'alice' };

const pat: PersonalAccessToken = {
  token: 'gh-token',
  providerName: 'github',
  scmProviderUrl: 'https://github.example.com',
  scmUserId: 'user-1',
  scmUserName: 'alice',
  scmTokenName: 'oauth2-github',
};

describe('OAuth broker', () => {
  let github: FakeAuthenticator;
  let bitbucketServer: FakeAuthenticator;
  let patManager: { get: jest.Mock<PersonalAccessTokenManager['get']> };
  let broker: OAuthBroker;
  let pendingFlowIds: string[];

  beforeEach(() => {
    github = createFakeAuthenticator('github', 'oauth2', {
      'user-1': { token: 'gh-token', scope: 'repo' },
    });
    bitbucketServer = createFakeAuthenticator('bitbucket-server', 'oauth1');
    patManager = { get: jest.fn<PersonalAccessTokenManager['get']>() };
    pendingFlowIds = [];

    broker = createOAuthBroker({
      registry: AuthenticatorRegistry.fromAuthenticators([bitbucketServer], [github]),
      personalAccessTokenManager: patManager,
      stateKey,
      stateTtl: '15m',
      baseUrl: 'https://broker.test',
      accessDeniedErrorPage: 'https://broker.test/error?error_code=access_denied',
      defaultRedirectAfterLogin: 'https://broker.test/',
    });
  });

  async function startFlow(providerName: string, redirectAfterLogin?: string, scopes: string[] = ['repo']) {
    const { location, flowId } = await broker.authenticate(subject, { providerName, scopes, redirectAfterLogin });
    pendingFlowIds.push(flowId);
    return new URL(location).searchParams.get('state') ?? '';
  }

  function complete(requestUrl: URL, errorValues?: string[]) {
    return broker.callback(requestUrl, { pendingFlowIds, errorValues });
  }

  function callbackUrl(query: Record<string, string>): URL {
    const url = new URL('https://broker.test/oauth/callback');
    for (const [name, value] of Object.entries(query)) {
      url.searchParams.append(name, value);
    }
    return url;
  }

  describe('authenticate', () => {
    it('redirects to the provider with a state describing the flow', async () => {
      const { location, flowId } = await broker.authenticate(subject, {
        providerName: 'github',
        scopes: ['repo', 'user'],
        redirectAfterLogin: 'https://dash.test/after',
      });

      expect(flowId).toMatch(/^[0-9a-f]{32}$/);
      const url = new URL(location);
      expect(url.origin + url.pathname).toBe('https://github.example.com/authorize');
      expect(url.searchParams.get('redirect_uri')).toBe('https://broker.test/oauth/callback');
      expect(await decodeCallbackState(url.searchParams.get('state'), stateKey)).toEqual({
        flowId,
        providerName: 'github',
        scopes: ['repo', 'user'],
        redirectAfterLogin: 'https://dash.test/after',
        userId: 'user-1',
        userName: 'alice',
      });
    });

    it('dispatches to OAuth1 providers through the same registry', async () => {
      await broker.authenticate(subject, { providerName: 'bitbucket-server' });

      expect(bitbucketServer.getAuthenticateUrl).toHaveBeenCalledWith(
        expect.objectContaining({ callbackUrl: 'https://broker.test/oauth/callback', scopes: [] })
      );
    });

    it('fails with NotFound for an unregistered provider', async () => {
      await expect(broker.authenticate(subject, { providerName: 'gitea' })).rejects.toThrow(
        new NotFoundError('Unsupported OAuth provider gitea')
      );
    });
  });

  describe('callback', () => {
    it('completes the flow and returns to the post-login URL', async () => {
      const state = await startFlow('github', 'https://dash.test/after');
      const requestUrl = callbackUrl({ state, code: 'code-1' });

      const result = await complete(requestUrl);

      expect(result).toMatchObject({ location: 'https://dash.test/after' });
      expect(github.callback).toHaveBeenCalledWith({
        requestUrl,
        scopes: ['repo'],
        subject: { userId: 'user-1', userName: 'alice' },
      });
    });

    it('keeps interleaved flows apart', async () => {
      const first = await startFlow('github', 'https://dash.test/first');
      const second = await startFlow('github', 'https://dash.test/second');

      expect(await complete(callbackUrl({ state: second, code: 'b' }))).toMatchObject({
        location: 'https://dash.test/second',
      });
      expect(await complete(callbackUrl({ state: first, code: 'a' }))).toMatchObject({
        location: 'https://dash.test/first',
      });
    });

    it('appends the error code when the user denied access', async () => {
      const state = await startFlow('github', 'https://dash.test/after?tab=git');

      const result = await complete(callbackUrl({ state, error: 'access_denied' }));

      expect(result).toMatchObject({ location: 'https://dash.test/after?tab=git&error_code=access_denied' });
      expect(github.callback).not.toHaveBeenCalled();
    });

    it('takes the error values from the argument when given', async () => {
      const state = await startFlow('github', 'https://dash.test/after');

      const result = await complete(callbackUrl({ state }), ['access_denied']);

      expect(result).toMatchObject({ location: 'https://dash.test/after?error_code=access_denied' });
    });

    it('redirects with the error code when the authenticator fails', async () => {
      github.callback.mockRejectedValueOnce(new OAuthAuthenticationError('bad code'));
      const state = await startFlow('github', 'https://dash.test/after');

      const result = await complete(callbackUrl({ state, code: 'stale' }));

      expect(result).toMatchObject({ location: 'https://dash.test/after?error_code=access_denied' });
    });

    it('sends a denied login without post-login URL to the error page', async () => {
      github.callback.mockRejectedValueOnce(new OAuthAuthenticationError('access_denied'));
      const state = await startFlow('github');

      const result = await complete(callbackUrl({ state, error: 'access_denied' }));

      expect(result).toMatchObject({ location: 'https://broker.test/error?error_code=access_denied' });
      expect(github.callback).toHaveBeenCalledTimes(1);
    });

    it('returns to the default post-login URL when none was given', async () => {
      const state = await startFlow('github');

      expect(await complete(callbackUrl({ state, code: 'code-1' }))).toMatchObject({
        location: 'https://broker.test/',
      });
    });

    it('propagates errors that are not authentication failures', async () => {
      github.callback.mockRejectedValueOnce(new Error('token store unavailable'));
      const state = await startFlow('github', 'https://dash.test/after');

      await expect(complete(callbackUrl({ state, code: 'code-1' }))).rejects.toThrow('token store unavailable');
    });

    it('reports the flow the callback completed', async () => {
      const state = await startFlow('github', 'https://dash.test/after');

      const result = await complete(callbackUrl({ state, code: 'code-1' }));

      expect(result).toEqual({ location: 'https://dash.test/after', flowId: pendingFlowIds[0] });
    });

    it('rejects a state started in another browser session', async () => {
      const state = await startFlow('github', 'https://dash.test/after');

      await expect(
        broker.callback(callbackUrl({ state, code: 'code-1' }), { pendingFlowIds: ['flow-of-this-browser'] })
      ).rejects.toThrow(new BadRequestError('OAuth flow was not started in this browser session'));
      expect(github.callback).not.toHaveBeenCalled();
    });

    it('rejects a denied login from another browser session before redirecting', async () => {
      const state = await startFlow('github', 'https://dash.test/after');

      await expect(
        broker.callback(callbackUrl({ state, error: 'access_denied' }), { pendingFlowIds: [] })
      ).rejects.toBeInstanceOf(BadRequestError);
    });

    it('rejects a missing or forged state', async () => {
      await expect(complete(callbackUrl({ code: 'code-1' }))).rejects.toBeInstanceOf(BadRequestError);
      await expect(complete(callbackUrl({ state: 'not-a-jwt', code: 'code-1' }))).rejects.toBeInstanceOf(
        BadRequestError
      );
    });

    it('fails with NotFound when the state names an unregistered provider', async () => {
      pendingFlowIds.push('flow-gitea');
      const state = await encodeCallbackState(
        { flowId: 'flow-gitea', providerName: 'gitea', scopes: [], userId: 'user-1', userName: 'alice' },
        stateKey,
        '15m'
      );

      await expect(complete(callbackUrl({ state, code: 'code-1' }))).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('getRegisteredAuthenticators', () => {
    it('describes every provider once with an authenticate link', () => {
      const descriptors = broker.getRegisteredAuthenticators('https://che.test/api');

      expect(descriptors).toEqual([
        {
          name: 'github',
          protocol: 'oauth2',
          endpointUrl: 'https://github.example.com',
          links: [
            {
              href: 'https://che.test/api/oauth/authenticate',
              rel: 'Authenticate URL',
              method: 'GET',
              parameters: [
                { name: 'oauth_provider', required: true, defaultValue: 'github' },
                { name: 'mode', required: true, defaultValue: 'federated_login' },
              ],
            },
          ],
        },
        {
          name: 'bitbucket-server',
          protocol: 'oauth1',
          endpointUrl: 'https://bitbucket-server.example.com',
          links: [
            {
              href: 'https://che.test/api/oauth/authenticate',
              rel: 'Authenticate URL',
              method: 'GET',
              parameters: [
                { name: 'oauth_provider', required: true, defaultValue: 'bitbucket-server' },
                { name: 'mode', required: true, defaultValue: 'federated_login' },
              ],
            },
          ],
        },
      ]);
    });

    it('defaults links to the broker base URL', () => {
      const [descriptor] = broker.getRegisteredAuthenticators();

      expect(descriptor.links[0].href).toBe('https://broker.test/oauth/authenticate');
    });
  });

  describe('getToken', () => {
    it('looks the token up by user id', async () => {
      expect(await broker.getToken(subject, 'github')).toEqual({ token: 'gh-token', scope: 'repo' });
      expect(github.getToken).toHaveBeenCalledTimes(1);
      expect(github.getToken).toHaveBeenCalledWith('user-1');
    });

    it('falls back to the user name', async () => {
      github.getToken.mockResolvedValueOnce(undefined).mockResolvedValueOnce({ token: 'by-name', scope: '' });

      expect(await broker.getToken(subject, 'github')).toEqual({ token: 'by-name', scope: '' });
      expect(github.getToken.mock.calls).toEqual([['user-1'], ['alice']]);
    });

    it('fails with Unauthorized when neither lookup finds a token', async () => {
      await expect(broker.getToken({ userId: 'user-2', userName: 'bob' }, 'github')).rejects.toThrow(
        new UnauthorizedError('OAuth token for user user-2 was not found')
      );
    });

    it('fails with ServerError when the lookup breaks', async () => {
      github.getToken.mockRejectedValueOnce(new Error('store down'));

      await expect(broker.getToken(subject, 'github')).rejects.toThrow(new ServerError('store down'));
    });

    it('fails with NotFound for an unregistered provider', async () => {
      await expect(broker.getToken(subject, 'gitea')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('invalidateToken', () => {
    it('revokes the personal access token of the subject', async () => {
      patManager.get.mockResolvedValueOnce(pat);

      await broker.invalidateToken(subject, 'github');

      expect(patManager.get).toHaveBeenCalledWith(subject, 'github');
      expect(github.invalidateToken).toHaveBeenCalledWith('gh-token');
    });

    it('fails with Unauthorized when there is no token', async () => {
      patManager.get.mockResolvedValueOnce(undefined);

      await expect(broker.invalidateToken(subject, 'github')).rejects.toThrow(
        new UnauthorizedError('OAuth token for provider github was not found')
      );
      expect(github.invalidateToken).not.toHaveBeenCalled();
    });

    it('fails with Unauthorized when the provider refuses revocation', async () => {
      patManager.get.mockResolvedValueOnce(pat);
      github.invalidateToken.mockResolvedValueOnce(false);

      await expect(broker.invalidateToken(subject, 'github')).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it.each([
      ['persistence', new ScmConfigurationPersistenceError('secret unreadable')],
      ['communication', new ScmCommunicationError('timeout', 504)],
    ])('collapses %s failures to Unauthorized', async (_kind, error) => {
      patManager.get.mockRejectedValueOnce(error);

      await expect(broker.invalidateToken(subject, 'github')).rejects.toThrow(
        new UnauthorizedError('OAuth token for provider github was not found')
      );
    });

    it('collapses revocation transport failures to Unauthorized', async () => {
      patManager.get.mockResolvedValueOnce(pat);
      github.invalidateToken.mockRejectedValueOnce(new Error('Network error contacting github'));

      await expect(broker.invalidateToken(subject, 'github')).rejects.toBeInstanceOf(UnauthorizedError);
    });

    it('fails with NotFound for an unregistered provider', async () => {
      await expect(broker.invalidateToken(subject, 'gitea')).rejects.toBeInstanceOf(NotFoundError);
      expect(patManager.get).not.toHaveBeenCalled();
    });
  });
});
