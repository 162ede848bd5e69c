/**
 * Provider Interface - Multi-Protocol OAuth Abstraction
 *
 * This file defines the contract every provider authenticator implements,
 * whichever OAuth protocol version it speaks. Authenticators are simple
 * objects (not classes) produced by factory functions, e.g.:
 *
 * ```typescript
 * const github = createOAuth2Authenticator({ name: 'github', ... }, { tokenStore });
 * registry.register(github);
 * ```
 */

/** Protocol variant an authenticator speaks */
export type AuthenticatorProtocol = 'oauth1' | 'oauth2';

/** Access credential for a (provider, user) pair */
export interface OAuthToken {
  token: string;
  scope: string;
  /** OAuth1 token secret, needed to sign requests with HMAC-SHA1 */
  tokenSecret?: string;
}

/** The user an operation acts for */
export interface Subject {
  userId: string;
  userName: string;
  /** Bearer token the subject authenticated with, if any */
  token?: string;
}

/** Parameters for creating the provider authorization URL */
export interface AuthenticateUrlParams {
  /** Broker callback endpoint the provider redirects back to */
  callbackUrl: string;
  scopes: string[];
  /** Opaque state value to be round-tripped through the provider */
  state: string;
}

/** Parameters for completing the flow from the provider redirect */
export interface CallbackParams {
  /** Full URL of the callback request, including the provider's query */
  requestUrl: URL;
  scopes: string[];
  /** Subject the resulting token is stored for */
  subject: Pick<Subject, 'userId' | 'userName'>;
}

/**
 * OAuth Authenticator
 *
 * Performs one provider's side of the flow. The broker never looks past this
 * interface, so OAuth1 and OAuth2 providers are dispatched the same way.
 */
export interface OAuthAuthenticator {
  /** Provider identifier (e.g., 'github', 'bitbucket-server') */
  readonly name: string;

  readonly protocol: AuthenticatorProtocol;

  /** Base URL of the provider's OAuth endpoints */
  getEndpointUrl(): string;

  /**
   * Build the URL the user agent is sent to for authorization.
   * OAuth1 providers fetch a request token first, hence the promise.
   */
  getAuthenticateUrl(params: AuthenticateUrlParams): Promise<string>;

  /**
   * Complete the flow: exchange the code/verifier for a token and store it
   * @throws OAuthAuthenticationError when the provider refused or the exchange failed
   */
  callback(params: CallbackParams): Promise<void>;

  /** Look up the stored token for a user id or user name */
  getToken(owner: string): Promise<OAuthToken | undefined>;

  /**
   * Revoke a token and forget it
   * @returns false when the token was unknown or the provider refused to revoke it
   */
  invalidateToken(token: string): Promise<boolean>;
}
