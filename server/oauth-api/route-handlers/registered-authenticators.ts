/**
 * Provider Directory Endpoint
 *
 * GET /oauth lists the registered providers with a link to start
 * authentication against each of them.
 */

import type { Request, Response } from 'express';
import type { OAuthBroker } from '../oauth-broker.js';
import { handleApiError } from '../api-error-helpers.js';

export function makeRegisteredAuthenticators(broker: OAuthBroker, options: { baseUrl: string }) {
  return async (_req: Request, res: Response): Promise<void> => {
    try {
      res.json(broker.getRegisteredAuthenticators(options.baseUrl));
    } catch (error) {
      await handleApiError(error, res);
    }
  };
}
