/**
 * Broker configuration
 *
 * Read once from the environment (after dotenv has loaded .env) and validated
 * with zod. A provider is configured only when all of its credentials are set.
 */

import { z } from 'zod';

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() !== '' ? value.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  BASE_URL: z
    .string()
    .url()
    .transform(value => value.replace(/\/+$/, '')),
  JWT_SECRET: z.string().min(16, 'JWT_SECRET must be at least 16 characters'),
  SESSION_SECRET: optionalString,
  ACCESS_DENIED_ERROR_PAGE: z.string().url().optional(),
  DEFAULT_REDIRECT_AFTER_LOGIN: z.string().url().optional(),
  STATE_TTL: z.string().regex(/^\d+\s*[smhd]$/, 'STATE_TTL must look like 15m').default('15m'),
  GITHUB_CLIENT_ID: optionalString,
  GITHUB_CLIENT_SECRET: optionalString,
  GITLAB_URL: z.string().url().default('https://gitlab.com'),
  GITLAB_CLIENT_ID: optionalString,
  GITLAB_CLIENT_SECRET: optionalString,
  BITBUCKET_CLIENT_ID: optionalString,
  BITBUCKET_CLIENT_SECRET: optionalString,
  BITBUCKET_SERVER_URL: optionalString,
  BITBUCKET_SERVER_CONSUMER_KEY: optionalString,
  BITBUCKET_SERVER_PRIVATE_KEY: optionalString,
});

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

export interface BrokerConfig {
  port: number;
  /** Public base URL of the broker, without trailing slash */
  baseUrl: string;
  jwtSecret: string;
  /** Signs the session cookie; defaults to the JWT secret */
  sessionSecret: string;
  /** Where a denied login lands when there is no post-login URL to return to */
  accessDeniedErrorPage: string;
  defaultRedirectAfterLogin: string;
  /** jose time span, e.g. '15m' */
  stateTtl: string;
  providers: {
    github?: ClientCredentials;
    gitlab?: ClientCredentials & { url: string };
    bitbucket?: ClientCredentials;
    bitbucketServer?: { url: string; consumerKey: string; privateKey: string };
  };
}

/**
 * Error thrown when the environment does not describe a usable configuration
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Error.captureStackTrace(this, ConfigurationError);
  }
}

function credentials(clientId: string | undefined, clientSecret: string | undefined): ClientCredentials | undefined {
  return clientId && clientSecret ? { clientId, clientSecret } : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BrokerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  const gitlab = credentials(e.GITLAB_CLIENT_ID, e.GITLAB_CLIENT_SECRET);
  const bitbucketServer =
    e.BITBUCKET_SERVER_URL && e.BITBUCKET_SERVER_CONSUMER_KEY && e.BITBUCKET_SERVER_PRIVATE_KEY
      ? {
          url: e.BITBUCKET_SERVER_URL.replace(/\/+$/, ''),
          consumerKey: e.BITBUCKET_SERVER_CONSUMER_KEY,
          // Keys are usually passed on one line with literal \n
          privateKey: e.BITBUCKET_SERVER_PRIVATE_KEY.replace(/\\n/g, '\n'),
        }
      : undefined;

  return {
    port: e.PORT,
    baseUrl: e.BASE_URL,
    jwtSecret: e.JWT_SECRET,
    sessionSecret: e.SESSION_SECRET ?? e.JWT_SECRET,
    accessDeniedErrorPage: e.ACCESS_DENIED_ERROR_PAGE ?? `${e.BASE_URL}/error?error_code=access_denied`,
    defaultRedirectAfterLogin: e.DEFAULT_REDIRECT_AFTER_LOGIN ?? `${e.BASE_URL}/`,
    stateTtl: e.STATE_TTL.replace(/\s+/g, ''),
    providers: {
      github: credentials(e.GITHUB_CLIENT_ID, e.GITHUB_CLIENT_SECRET),
      gitlab: gitlab && { ...gitlab, url: e.GITLAB_URL.replace(/\/+$/, '') },
      bitbucket: credentials(e.BITBUCKET_CLIENT_ID, e.BITBUCKET_CLIENT_SECRET),
      bitbucketServer,
    },
  };
}
