/**
 * Authenticate Endpoint
 *
 * GET /oauth/authenticate?oauth_provider=github&scope=repo&redirect_after_login=...
 * Answers 307 to the provider's authorization URL and records the flow in
 * the browser session.
 */

import type { Request, Response } from 'express';
import type { OAuthBroker } from '../oauth-broker.js';
import { getSubject } from '../subject.js';
import { rememberFlow } from '../flow-session.js';
import { handleApiError, queryValue, queryValues } from '../api-error-helpers.js';

export function makeAuthenticate(broker: OAuthBroker) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const { location, flowId } = await broker.authenticate(getSubject(req), {
        providerName: queryValue(req.query.oauth_provider),
        scopes: queryValues(req.query.scope),
        redirectAfterLogin: queryValue(req.query.redirect_after_login),
      });
      rememberFlow(req, flowId);
      res.redirect(307, location);
    } catch (error) {
      await handleApiError(error, res);
    }
  };
}
