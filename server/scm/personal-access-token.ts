/**
 * Personal Access Tokens
 *
 * Long-lived source-control credentials kept per user and provider. The broker
 * only reads them to find the token it has to revoke.
 */

import type { OAuthToken, Subject } from '../providers/provider-interface.js';
import type { AuthenticatorRegistry } from '../providers/provider-registry.js';
import type { TokenStore } from '../providers/token-store.js';

export interface PersonalAccessToken {
  token: string;
  providerName: string;
  scmProviderUrl: string;
  scmUserId: string;
  scmUserName: string;
  scmTokenName: string;
}

/**
 * Error thrown when stored token configuration cannot be read or written
 */
export class ScmConfigurationPersistenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScmConfigurationPersistenceError';
    Error.captureStackTrace(this, ScmConfigurationPersistenceError);
  }
}

/**
 * Error thrown when the source-control provider rejects the credential
 */
export class ScmUnauthorizedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ScmUnauthorizedError';
    Error.captureStackTrace(this, ScmUnauthorizedError);
  }
}

/**
 * Error thrown when the source-control provider cannot be reached
 */
export class ScmCommunicationError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = 'ScmCommunicationError';
    this.statusCode = statusCode;
    Error.captureStackTrace(this, ScmCommunicationError);
  }
}

export function isScmError(error: unknown): error is ScmConfigurationPersistenceError | ScmUnauthorizedError | ScmCommunicationError {
  return (
    error instanceof ScmConfigurationPersistenceError ||
    error instanceof ScmUnauthorizedError ||
    error instanceof ScmCommunicationError
  );
}

export interface PersonalAccessTokenManager {
  /**
   * Find the subject's token for a provider
   * @param scmServerUrl - narrows the lookup to one server of the provider
   * @throws ScmConfigurationPersistenceError | ScmUnauthorizedError | ScmCommunicationError
   */
  get(subject: Subject, providerName: string, scmServerUrl?: string): Promise<PersonalAccessToken | undefined>;
}

/**
 * PAT manager backed by the authenticators' token store: the token obtained
 * through the OAuth flow is the subject's personal access token.
 */
export class TokenStorePersonalAccessTokenManager implements PersonalAccessTokenManager {
  constructor(
    private readonly tokenStore: TokenStore,
    private readonly registry: AuthenticatorRegistry
  ) {}

  async get(subject: Subject, providerName: string, scmServerUrl?: string): Promise<PersonalAccessToken | undefined> {
    const entry = this.registry.get(providerName);
    if (!entry) {
      return undefined;
    }

    const endpointUrl = entry.authenticator.getEndpointUrl();
    if (scmServerUrl && trimSlashes(scmServerUrl) !== trimSlashes(endpointUrl)) {
      return undefined;
    }

    let stored: OAuthToken | undefined;
    try {
      stored =
        (await this.tokenStore.get(providerName, subject.userId)) ??
        (await this.tokenStore.get(providerName, subject.userName));
    } catch (err) {
      throw new ScmConfigurationPersistenceError(err instanceof Error ? err.message : String(err));
    }
    if (!stored) {
      return undefined;
    }

    return {
      token: stored.token,
      providerName,
      scmProviderUrl: endpointUrl,
      scmUserId: subject.userId,
      scmUserName: subject.userName,
      scmTokenName: `${entry.protocol}-${providerName}`,
    };
  }
}

function trimSlashes(url: string): string {
  return url.replace(/\/+$/, '');
}
