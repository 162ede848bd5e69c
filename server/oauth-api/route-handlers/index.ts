/**
 * OAuth Broker Routes
 *
 * Usage:
 *   app.use(OAUTH_PATH, createOAuthRouter(broker, { baseUrl, subjectKey }));
 *
 * Routes (relative to /oauth):
 *   GET    /              provider directory (public)
 *   GET    /authenticate  start a flow (bearer token)
 *   GET    /callback      provider redirect target (state-authenticated)
 *   GET    /token         stored token (bearer token)
 *   DELETE /token         revoke stored token (bearer token)
 */

import type { KeyObject } from 'crypto';
import { Router } from 'express';
import cors from 'cors';
import type { OAuthBroker } from '../oauth-broker.js';
import { requireSubject } from '../subject.js';
import { makeAuthenticate } from './authenticate.js';
import { makeCallback } from './callback.js';
import { makeRegisteredAuthenticators } from './registered-authenticators.js';
import { makeGetToken, makeInvalidateToken } from './token.js';

export { makeAuthenticate, makeCallback, makeRegisteredAuthenticators, makeGetToken, makeInvalidateToken };

export interface OAuthRouterOptions {
  baseUrl: string;
  /** Key subject bearer tokens are verified with */
  subjectKey: KeyObject;
}

export function createOAuthRouter(broker: OAuthBroker, options: OAuthRouterOptions): Router {
  const router = Router();
  const authenticated = requireSubject(options.subjectKey);

  router.get('/', cors(), makeRegisteredAuthenticators(broker, options));
  router.get('/authenticate', authenticated, makeAuthenticate(broker));
  router.get('/callback', makeCallback(broker, options));
  router.get('/token', authenticated, makeGetToken(broker));
  router.delete('/token', authenticated, makeInvalidateToken(broker));

  return router;
}
