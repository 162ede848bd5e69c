/**
 * In-process authenticator fake for broker and route tests
 */

import { jest } from '@jest/globals';
import type {
  AuthenticateUrlParams,
  AuthenticatorProtocol,
  CallbackParams,
  OAuthAuthenticator,
  OAuthToken,
} from '../providers/provider-interface.js';

export interface FakeAuthenticator extends OAuthAuthenticator {
  getAuthenticateUrl: jest.Mock<(params: AuthenticateUrlParams) => Promise<string>>;
  callback: jest.Mock<(params: CallbackParams) => Promise<void>>;
  getToken: jest.Mock<(owner: string) => Promise<OAuthToken | undefined>>;
  invalidateToken: jest.Mock<(token: string) => Promise<boolean>>;
}

export function createFakeAuthenticator(
  name: string,
  protocol: AuthenticatorProtocol = 'oauth2',
  tokens: Record<string, OAuthToken> = {}
): FakeAuthenticator {
  return {
    name,
    protocol,
    getEndpointUrl: () => `https://${name}.example.com`,
    getAuthenticateUrl: jest.fn(async (params: AuthenticateUrlParams) => {
      const url = new URL(`https://${name}.example.com/authorize`);
      url.searchParams.set('redirect_uri', params.callbackUrl);
      url.searchParams.set('state', params.state);
      return url.toString();
    }),
    callback: jest.fn(async (_params: CallbackParams) => {}),
    getToken: jest.fn(async (owner: string) => tokens[owner]),
    invalidateToken: jest.fn(async (_token: string) => true),
  };
}
