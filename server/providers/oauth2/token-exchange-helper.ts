/**
 * Token Exchange Helper Utilities
 *
 * OAuth2 authorization-code exchange and RFC 7009 token revocation against a
 * provider's endpoints. Uses the global fetch.
 */

import { z } from 'zod';
import { logger } from '../../observability/logger.js';

/**
 * Configuration for token exchange request
 */
export interface TokenExchangeConfig {
  /** Provider name, used for logging */
  provider: string;
  /** Token endpoint URL */
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
}

export interface TokenExchangeParams {
  code: string;
  redirectUri: string;
}

/** Normalized token endpoint answer */
export interface StandardTokenResponse {
  access_token: string;
  token_type: string;
  scope?: string;
  refresh_token?: string;
  expires_in?: number;
}

const tokenResponseSchema = z
  .object({
    access_token: z.string().min(1),
    token_type: z.string().default('bearer'),
    scope: z.string().optional(),
    refresh_token: z.string().optional(),
    expires_in: z.coerce.number().optional(),
  })
  .passthrough();

/**
 * Exchange authorization code for an access token
 *
 * @throws Error if the request fails, the provider answers non-2xx or returns no access_token
 */
export async function performTokenExchange(
  config: TokenExchangeConfig,
  params: TokenExchangeParams
): Promise<StandardTokenResponse> {
  const body: Record<string, string> = {
    grant_type: 'authorization_code',
    client_id: config.clientId,
    client_secret: config.clientSecret,
    code: params.code,
    redirect_uri: params.redirectUri,
  };

  logger.info('Exchanging authorization code', { provider: config.provider, tokenUrl: config.tokenUrl });

  let tokenRes: Response;
  try {
    tokenRes = await fetch(config.tokenUrl, {
      method: 'POST',
      headers: {
        Accept: 'application/json',
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams(body).toString(),
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error('Network error during token exchange', { provider: config.provider, error: message });
    throw new Error(`Network error contacting ${config.provider}: ${message}`);
  }

  if (!tokenRes.ok) {
    const errorText = await tokenRes.text();
    logger.error('Token exchange failed', { provider: config.provider, status: tokenRes.status });
    throw new Error(`Token exchange failed (${tokenRes.status}): ${errorText}`);
  }

  // Some providers answer 200 with an error payload instead of a token
  const parsed = tokenResponseSchema.safeParse(await tokenRes.json());
  if (!parsed.success) {
    logger.error('Token exchange returned no access_token', { provider: config.provider });
    throw new Error(`Token exchange failed: no access_token in ${config.provider} response`);
  }

  logger.info('Token exchange successful', {
    provider: config.provider,
    hasRefreshToken: !!parsed.data.refresh_token,
    scope: parsed.data.scope,
  });

  return {
    access_token: parsed.data.access_token,
    token_type: parsed.data.token_type,
    scope: parsed.data.scope,
    refresh_token: parsed.data.refresh_token,
    expires_in: parsed.data.expires_in,
  };
}

/**
 * Configuration for RFC 7009 token revocation
 */
export interface TokenRevocationConfig {
  provider: string;
  revocationUrl: string;
  clientId: string;
  clientSecret: string;
}

/**
 * Revoke a token at the provider
 * Client credentials are sent with HTTP Basic auth.
 *
 * @returns whether the provider accepted the revocation
 */
export async function performTokenRevocation(config: TokenRevocationConfig, token: string): Promise<boolean> {
  const credentials = Buffer.from(`${config.clientId}:${config.clientSecret}`).toString('base64');

  let res: Response;
  try {
    res = await fetch(config.revocationUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Authorization: `Basic ${credentials}`,
      },
      body: new URLSearchParams({ token }).toString(),
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error('Network error during token revocation', { provider: config.provider, error: message });
    throw new Error(`Network error contacting ${config.provider}: ${message}`);
  }

  if (!res.ok) {
    logger.warn('Token revocation refused', { provider: config.provider, status: res.status });
    return false;
  }
  return true;
}
