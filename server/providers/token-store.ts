/**
 * Token Store
 *
 * Keeps provider tokens per (provider, owner), where the owner is a user id
 * or a user name. The OAuth authenticators write here after a successful
 * callback; the personal access token manager reads from it.
 */

import type { OAuthToken } from './provider-interface.js';

export interface TokenStore {
  get(provider: string, owner: string): Promise<OAuthToken | undefined>;
  put(provider: string, owner: string, token: OAuthToken): Promise<void>;
  /**
   * Remove every entry of the provider that holds this token value
   * @returns whether anything was removed
   */
  remove(provider: string, token: string): Promise<boolean>;
}

/**
 * In-memory token store
 * Key: `${provider}\u0000${owner}`
 */
export class InMemoryTokenStore implements TokenStore {
  private tokens = new Map<string, OAuthToken>();

  async get(provider: string, owner: string): Promise<OAuthToken | undefined> {
    return this.tokens.get(storeKey(provider, owner));
  }

  async put(provider: string, owner: string, token: OAuthToken): Promise<void> {
    this.tokens.set(storeKey(provider, owner), token);
  }

  async remove(provider: string, token: string): Promise<boolean> {
    const prefix = storeKey(provider, '');
    let removed = false;

    for (const [key, entry] of this.tokens) {
      if (key.startsWith(prefix) && entry.token === token) {
        this.tokens.delete(key);
        removed = true;
      }
    }

    return removed;
  }

  get size(): number {
    return this.tokens.size;
  }
}

function storeKey(provider: string, owner: string): string {
  return `${provider}\u0000${owner}`;
}
