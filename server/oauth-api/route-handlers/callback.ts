/**
 * Callback Endpoint
 *
 * GET /oauth/callback?state=...&code=... (or ?state=...&error=access_denied)
 *
 * The provider redirects the user agent here, so the request carries no
 * bearer token; the subject comes from the signed state, which is only
 * accepted from the session that started the flow. The request URL is
 * rebuilt on the configured callback URL so it matches the redirect_uri the
 * provider was given, whatever proxy sits in front of the broker.
 */

import type { Request, Response } from 'express';
import { OAUTH_PATH, type OAuthBroker } from '../oauth-broker.js';
import { handleApiError } from '../api-error-helpers.js';
import { forgetFlow, pendingFlows } from '../flow-session.js';

export function makeCallback(broker: OAuthBroker, options: { baseUrl: string }) {
  const callbackUrl = `${options.baseUrl}${OAUTH_PATH}/callback`;

  return async (req: Request, res: Response): Promise<void> => {
    try {
      const requestUrl = new URL(callbackUrl);
      const queryStart = req.originalUrl.indexOf('?');
      if (queryStart >= 0) {
        requestUrl.search = req.originalUrl.slice(queryStart);
      }

      const { location, flowId } = await broker.callback(requestUrl, { pendingFlowIds: pendingFlows(req) });
      forgetFlow(req, flowId);
      res.redirect(307, location);
    } catch (error) {
      await handleApiError(error, res);
    }
  };
}
