/**
 * Token Endpoints
 *
 * GET    /oauth/token?oauth_provider=github  → stored token of the subject
 * DELETE /oauth/token?oauth_provider=github  → revoke it (204)
 */

import type { Request, Response } from 'express';
import type { OAuthBroker } from '../oauth-broker.js';
import { getSubject } from '../subject.js';
import { handleApiError, queryValue } from '../api-error-helpers.js';

export function makeGetToken(broker: OAuthBroker) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const token = await broker.getToken(getSubject(req), queryValue(req.query.oauth_provider));
      res.json(token);
    } catch (error) {
      await handleApiError(error, res);
    }
  };
}

export function makeInvalidateToken(broker: OAuthBroker) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      await broker.invalidateToken(getSubject(req), queryValue(req.query.oauth_provider));
      res.status(204).end();
    } catch (error) {
      await handleApiError(error, res);
    }
  };
}
