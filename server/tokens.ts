import { SignJWT, jwtVerify as joseVerify, type JWTPayload } from 'jose';
import { createSecretKey, type KeyObject } from 'crypto';

export type { JWTPayload };

/**
 * Create the HS256 key used for subject tokens and callback state
 */
export function createSigningKey(secret: string): KeyObject {
  return createSecretKey(Buffer.from(secret));
}

/**
 * Sign a JWT token with the provided payload
 * @param expiresIn - jose time span ('2m', '15m') or an absolute epoch-seconds value
 * @returns The signed JWT token
 */
export async function jwtSign(payload: JWTPayload, key: KeyObject, expiresIn: string | number = '2m'): Promise<string> {
  const { exp, iat, ...claims } = payload;

  const jwt = new SignJWT(claims)
    .setProtectedHeader({ alg: 'HS256' })
    .setIssuedAt(iat)
    .setExpirationTime(exp ?? expiresIn);

  return await jwt.sign(key);
}

/**
 * Verify and decode a JWT token
 * @param options.audience - required `aud` claim
 * @throws when the signature, algorithm, expiry or audience does not check out
 */
export async function jwtVerify(
  token: string,
  key: KeyObject,
  options: { audience?: string } = {}
): Promise<JWTPayload> {
  const { payload } = await joseVerify(token, key, { algorithms: ['HS256'], audience: options.audience });
  return payload;
}
