/**
 * OAuth2 URL Builder Utilities
 *
 * Builds provider authorization URLs with consistent parameter handling.
 */

import type { AuthenticateUrlParams } from '../provider-interface.js';

/**
 * Configuration for building OAuth2 authorization URLs
 */
export interface OAuthUrlBuilderConfig {
  /** Authorization endpoint URL */
  authorizationUrl: string;
  clientId: string;
  /** Scopes requested when the caller asks for none */
  defaultScopes?: string[];
}

/**
 * Build an OAuth2 authorization-code URL
 *
 * @param config - Provider-specific configuration
 * @param params - Callback URL, scopes and state for this flow
 * @returns Complete authorization URL
 */
export function buildOAuthUrl(config: OAuthUrlBuilderConfig, params: AuthenticateUrlParams): string {
  const scopes = params.scopes.length > 0 ? params.scopes : config.defaultScopes ?? [];

  const urlParams: Record<string, string> = {
    client_id: config.clientId,
    response_type: 'code',
    redirect_uri: params.callbackUrl,
  };

  if (scopes.length > 0) {
    urlParams.scope = scopes.join(' ');
  }

  urlParams.state = params.state;

  const url = new URL(config.authorizationUrl);
  for (const [key, value] of Object.entries(urlParams)) {
    url.searchParams.set(key, value);
  }
  return url.toString();
}
