/**
 * OAuth 1.0a request signing (RFC 5849 §3.4)
 */

import { createHmac, createSign, randomBytes } from 'crypto';

export type SignatureMethod = 'HMAC-SHA1' | 'RSA-SHA1';

export interface OAuth1Credentials {
  consumerKey: string;
  /** Shared secret for HMAC-SHA1 */
  consumerSecret?: string;
  /** PEM private key for RSA-SHA1 */
  privateKey?: string;
  token?: string;
  tokenSecret?: string;
}

export interface SignRequestOptions {
  method: string;
  url: string;
  /** Extra oauth_* protocol parameters, e.g. oauth_callback or oauth_verifier */
  oauthParams?: Record<string, string>;
  nonce?: string;
  timestamp?: number;
}

/**
 * RFC 3986 percent-encoding as required by RFC 5849 §3.6
 */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(/[!'()*]/g, c => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Base string URI: scheme and host lowercased, default port and query dropped
 */
export function baseStringUri(url: URL): string {
  return `${url.protocol}//${url.host}${url.pathname}`;
}

/**
 * Normalize parameters: encode, sort by name then value, join with '&'
 */
export function normalizeParameters(params: Array<[string, string]>): string {
  return params
    .map(([name, value]): [string, string] => [percentEncode(name), percentEncode(value)])
    .sort(([aName, aValue], [bName, bValue]) => {
      if (aName !== bName) return aName < bName ? -1 : 1;
      if (aValue === bValue) return 0;
      return aValue < bValue ? -1 : 1;
    })
    .map(([name, value]) => `${name}=${value}`)
    .join('&');
}

export function signatureBaseString(method: string, url: URL, params: Array<[string, string]>): string {
  return [
    method.toUpperCase(),
    percentEncode(baseStringUri(url)),
    percentEncode(normalizeParameters(params)),
  ].join('&');
}

export function sign(baseString: string, credentials: OAuth1Credentials, method: SignatureMethod): string {
  if (method === 'RSA-SHA1') {
    if (!credentials.privateKey) {
      throw new Error('RSA-SHA1 signing requires a private key');
    }
    return createSign('RSA-SHA1').update(baseString).sign(credentials.privateKey, 'base64');
  }

  const key = `${percentEncode(credentials.consumerSecret ?? '')}&${percentEncode(credentials.tokenSecret ?? '')}`;
  return createHmac('sha1', key).update(baseString).digest('base64');
}

/**
 * Sign a request and build its `Authorization: OAuth ...` header value
 */
export function buildAuthorizationHeader(credentials: OAuth1Credentials, options: SignRequestOptions): string {
  const signatureMethod: SignatureMethod = credentials.privateKey ? 'RSA-SHA1' : 'HMAC-SHA1';
  const url = new URL(options.url);

  const protocolParams: Record<string, string> = {
    oauth_consumer_key: credentials.consumerKey,
    oauth_nonce: options.nonce ?? randomBytes(16).toString('hex'),
    oauth_signature_method: signatureMethod,
    oauth_timestamp: String(options.timestamp ?? Math.floor(Date.now() / 1000)),
    oauth_version: '1.0',
    ...options.oauthParams,
  };
  if (credentials.token) {
    protocolParams.oauth_token = credentials.token;
  }

  const params: Array<[string, string]> = [
    ...url.searchParams.entries(),
    ...Object.entries(protocolParams),
  ];

  const baseString = signatureBaseString(options.method, url, params);
  protocolParams.oauth_signature = sign(baseString, credentials, signatureMethod);

  const header = Object.entries(protocolParams)
    .map(([name, value]) => `${percentEncode(name)}="${percentEncode(value)}"`)
    .join(', ');
  return `OAuth ${header}`;
}
