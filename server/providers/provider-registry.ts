/**
 * Authenticator Registry
 *
 * Single registry of provider authenticators keyed by provider name. Each
 * entry is tagged with the protocol version it speaks, so callers dispatch by
 * name alone and only look at the tag when they need to.
 */

import type { AuthenticatorProtocol, OAuthAuthenticator } from './provider-interface.js';
import { NotFoundError, ProviderConfigurationError } from '../oauth-api/errors.js';
import { logger } from '../observability/logger.js';

export interface RegisteredAuthenticator {
  name: string;
  protocol: AuthenticatorProtocol;
  authenticator: OAuthAuthenticator;
}

export class AuthenticatorRegistry {
  private entries = new Map<string, RegisteredAuthenticator>();

  /**
   * Build a registry from separate OAuth1 and OAuth2 provider lists.
   * A name present in both lists is registered once; the OAuth2 entry wins.
   */
  static fromAuthenticators(
    oauth1: OAuthAuthenticator[],
    oauth2: OAuthAuthenticator[]
  ): AuthenticatorRegistry {
    const registry = new AuthenticatorRegistry();
    for (const authenticator of oauth2) {
      registry.register(authenticator);
    }
    for (const authenticator of oauth1) {
      if (registry.has(authenticator.name)) {
        logger.warn('Skipping OAuth1 provider shadowed by an OAuth2 provider', { provider: authenticator.name });
        continue;
      }
      registry.register(authenticator);
    }
    return registry;
  }

  register(authenticator: OAuthAuthenticator): void {
    const existing = this.entries.get(authenticator.name);
    if (existing) {
      throw new ProviderConfigurationError(
        `OAuth provider ${authenticator.name} is already registered (${existing.protocol})`
      );
    }

    this.entries.set(authenticator.name, {
      name: authenticator.name,
      protocol: authenticator.protocol,
      authenticator,
    });
    logger.info('Registered OAuth provider', { provider: authenticator.name, protocol: authenticator.protocol });
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): RegisteredAuthenticator | undefined {
    return this.entries.get(name);
  }

  /**
   * @throws NotFoundError when no authenticator is registered under the name
   */
  require(name: string | undefined): RegisteredAuthenticator {
    const entry = name ? this.entries.get(name) : undefined;
    if (!entry) {
      logger.warn('Unsupported OAuth provider', { provider: name });
      throw new NotFoundError(`Unsupported OAuth provider ${name}`);
    }
    return entry;
  }

  list(): RegisteredAuthenticator[] {
    return [...this.entries.values()];
  }

  names(protocol?: AuthenticatorProtocol): string[] {
    return this.list()
      .filter(entry => !protocol || entry.protocol === protocol)
      .map(entry => entry.name);
  }
}
