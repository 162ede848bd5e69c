/**
 * Express application factory
 *
 * Wires the broker, its collaborators and the HTTP middleware together.
 * Collaborators can be swapped (tests pass in-memory fakes); anything left
 * out is built from the config.
 */

import * as Sentry from '@sentry/node';
import express, { type Express } from 'express';
import session from 'express-session';
import morgan from 'morgan';
import type { BrokerConfig } from './config.js';
import { logger } from './observability/logger.js';
import { createSigningKey } from './tokens.js';
import { InMemoryTokenStore, type TokenStore } from './providers/token-store.js';
import type { AuthenticatorRegistry } from './providers/provider-registry.js';
import { createConfiguredRegistry } from './providers/provider-catalog.js';
import {
  TokenStorePersonalAccessTokenManager,
  type PersonalAccessTokenManager,
} from './scm/personal-access-token.js';
import { createOAuthBroker, OAUTH_PATH, type OAuthBroker } from './oauth-api/oauth-broker.js';
import { createOAuthRouter } from './oauth-api/route-handlers/index.js';

export interface AppDependencies {
  tokenStore?: TokenStore;
  registry?: AuthenticatorRegistry;
  personalAccessTokenManager?: PersonalAccessTokenManager;
}

export interface BrokerApp {
  app: Express;
  broker: OAuthBroker;
  registry: AuthenticatorRegistry;
}

export function createApp(config: BrokerConfig, deps: AppDependencies = {}): BrokerApp {
  const tokenStore = deps.tokenStore ?? new InMemoryTokenStore();
  const registry = deps.registry ?? createConfiguredRegistry(config.providers, tokenStore);
  const personalAccessTokenManager =
    deps.personalAccessTokenManager ?? new TokenStorePersonalAccessTokenManager(tokenStore, registry);
  const signingKey = createSigningKey(config.jwtSecret);

  const broker = createOAuthBroker({
    registry,
    personalAccessTokenManager,
    stateKey: signingKey,
    stateTtl: config.stateTtl,
    baseUrl: config.baseUrl,
    accessDeniedErrorPage: config.accessDeniedErrorPage,
    defaultRedirectAfterLogin: config.defaultRedirectAfterLogin,
  });

  const app = express();

  // Behind a load balancer: honour X-Forwarded-Proto
  app.set('trust proxy', 1);

  app.use(
    morgan('common', {
      stream: {
        write: (message: string) => logger.info(message.trim()),
      },
    })
  );

  // Pending OAuth flows live in the session; see oauth-api/flow-session.ts
  app.use(
    session({
      secret: config.sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: {
        secure: 'auto',
        httpOnly: true,
        sameSite: 'lax',
        maxAge: 24 * 60 * 60 * 1000,
      },
    })
  );

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(OAUTH_PATH, createOAuthRouter(broker, { baseUrl: config.baseUrl, subjectKey: signingKey }));

  Sentry.setupExpressErrorHandler(app);

  return { app, broker, registry };
}
