/**
 * OAuth Broker Errors
 *
 * Error types raised by the broker. Each carries the HTTP status the route
 * layer answers with (see api-error-helpers.ts).
 */

/**
 * Base class for errors that map onto an HTTP status
 */
export class HttpError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    Error.captureStackTrace(this, new.target);
  }
}

/**
 * Error thrown when a provider (or other addressed resource) is not registered
 */
export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when the caller has no usable credential
 */
export class UnauthorizedError extends HttpError {
  constructor(message: string) {
    super(message, 401);
    this.name = 'UnauthorizedError';
  }
}

/**
 * Error thrown for malformed requests, e.g. a forged or expired callback state
 */
export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'BadRequestError';
  }
}

/**
 * Error thrown when a collaborator (token store, provider) fails unexpectedly
 */
export class ServerError extends HttpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500);
    this.name = 'ServerError';
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

/**
 * Error thrown by authenticators when the provider refuses or the
 * authorization response cannot be completed
 */
export class OAuthAuthenticationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OAuthAuthenticationError';
    Error.captureStackTrace(this, OAuthAuthenticationError);
  }
}

/**
 * Error thrown when two authenticators are registered under the same name
 */
export class ProviderConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ProviderConfigurationError';
    Error.captureStackTrace(this, ProviderConfigurationError);
  }
}
