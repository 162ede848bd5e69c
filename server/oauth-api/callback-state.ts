/**
 * Callback State
 *
 * The bag of parameters that has to survive the round trip through the
 * provider: which provider was asked, with which scopes, where to send the
 * user afterwards and who started the flow. It travels as the OAuth `state`
 * parameter, signed so the callback can trust the subject it names.
 *
 * States carry their own audience so they are never accepted as bearer
 * tokens, and a flow id that ties them to the browser session that started
 * the flow.
 */

import type { KeyObject } from 'crypto';
import { z } from 'zod';
import { jwtSign, jwtVerify } from '../tokens.js';
import { BadRequestError } from './errors.js';

/** `aud` claim of every callback state */
export const STATE_AUDIENCE = 'oauth-callback-state';

export interface CallbackState {
  /** Id of the flow, recorded in the session of the browser that started it */
  flowId: string;
  providerName: string;
  scopes: string[];
  redirectAfterLogin?: string;
  userId: string;
  userName: string;
}

const statePayloadSchema = z.object({
  jti: z.string().min(1),
  oauth_provider: z.string().min(1),
  scope: z.array(z.string()).default([]),
  redirect_after_login: z.string().optional(),
  sub: z.string().min(1),
  uname: z.string().optional(),
});

export async function encodeCallbackState(state: CallbackState, key: KeyObject, ttl: string): Promise<string> {
  return jwtSign(
    {
      aud: STATE_AUDIENCE,
      jti: state.flowId,
      oauth_provider: state.providerName,
      scope: state.scopes,
      ...(state.redirectAfterLogin ? { redirect_after_login: state.redirectAfterLogin } : {}),
      sub: state.userId,
      uname: state.userName,
    },
    key,
    ttl
  );
}

/**
 * @throws BadRequestError when the state is missing, forged, expired or malformed
 */
export async function decodeCallbackState(value: string | null | undefined, key: KeyObject): Promise<CallbackState> {
  if (!value) {
    throw new BadRequestError('Missing OAuth state parameter');
  }

  let payload: unknown;
  try {
    payload = await jwtVerify(value, key, { audience: STATE_AUDIENCE });
  } catch (err) {
    throw new BadRequestError(`Invalid OAuth state parameter: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = statePayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new BadRequestError('Invalid OAuth state parameter: unexpected content');
  }

  return {
    flowId: parsed.data.jti,
    providerName: parsed.data.oauth_provider,
    scopes: parsed.data.scope,
    redirectAfterLogin: parsed.data.redirect_after_login,
    userId: parsed.data.sub,
    userName: parsed.data.uname ?? parsed.data.sub,
  };
}
