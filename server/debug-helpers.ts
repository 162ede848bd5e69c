/**
 * Debug helpers for OAuth flow troubleshooting
 */

import type { BrokerConfig } from './config.js';
import type { AuthenticatorRegistry } from './providers/provider-registry.js';
import { logger } from './observability/logger.js';

/**
 * Log the effective configuration at startup, secrets masked
 */
export function logEnvironmentInfo(config: BrokerConfig, registry: AuthenticatorRegistry): void {
  logger.info('Environment info', {
    nodeVersion: process.version,
    environment: process.env.NODE_ENV || 'development',
    port: config.port,
    baseUrl: config.baseUrl,
    jwtSecret: maskSensitive(config.jwtSecret, 0),
    sessionSecret: maskSensitive(config.sessionSecret, 0),
    stateTtl: config.stateTtl,
    accessDeniedErrorPage: config.accessDeniedErrorPage,
    defaultRedirectAfterLogin: config.defaultRedirectAfterLogin,
    oauth2Providers: registry.names('oauth2'),
    oauth1Providers: registry.names('oauth1'),
  });
}

/**
 * Mask sensitive data in strings for logging
 */
export function maskSensitive(value: string | undefined, showLength: number = 4): string {
  if (!value) return 'NOT SET';
  if (value.length <= showLength) return value;
  return `${value.substring(0, showLength)}... (length: ${value.length})`;
}
