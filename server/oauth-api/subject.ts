/**
 * Subject resolution
 *
 * Resolves the current user from `Authorization: Bearer <jwt>` (HS256, signed
 * with JWT_SECRET). `sub` is the user id; the user name comes from
 * `preferred_username` or `name`, falling back to the id. Callback states are
 * signed with the same key and are refused here by their audience.
 */

import type { KeyObject } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import type { Subject } from '../providers/provider-interface.js';
import { jwtVerify, type JWTPayload } from '../tokens.js';
import { logger } from '../observability/logger.js';
import { UnauthorizedError } from './errors.js';
import { STATE_AUDIENCE } from './callback-state.js';
import { handleApiError } from './api-error-helpers.js';

const subjects = new WeakMap<Request, Subject>();

export async function resolveSubject(authorization: string | undefined, key: KeyObject): Promise<Subject> {
  const match = authorization?.match(/^Bearer\s+(.+)$/i);
  if (!match) {
    throw new UnauthorizedError('Missing bearer token');
  }

  const token = match[1].trim();
  let payload: JWTPayload;
  try {
    payload = await jwtVerify(token, key);
  } catch (err) {
    logger.warn('Rejected bearer token', { error: err instanceof Error ? err.message : String(err) });
    throw new UnauthorizedError('Invalid bearer token');
  }

  const audiences: Array<string | undefined> = Array.isArray(payload.aud) ? payload.aud : [payload.aud];
  if (audiences.includes(STATE_AUDIENCE)) {
    logger.warn('Rejected callback state presented as bearer token', { sub: payload.sub });
    throw new UnauthorizedError('Invalid bearer token');
  }

  if (!payload.sub) {
    throw new UnauthorizedError('Bearer token has no subject');
  }

  const userName =
    typeof payload.preferred_username === 'string'
      ? payload.preferred_username
      : typeof payload.name === 'string'
        ? payload.name
        : payload.sub;

  return { userId: payload.sub, userName, token };
}

/**
 * Express middleware rejecting requests without a valid subject token
 */
export function requireSubject(key: KeyObject) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      subjects.set(req, await resolveSubject(req.headers.authorization, key));
    } catch (err) {
      await handleApiError(err, res);
      return;
    }
    next();
  };
}

/**
 * Subject resolved by requireSubject for this request
 * @throws UnauthorizedError when the middleware did not run or rejected the request
 */
export function getSubject(req: Request): Subject {
  const subject = subjects.get(req);
  if (!subject) {
    throw new UnauthorizedError('Request has no authenticated subject');
  }
  return subject;
}
