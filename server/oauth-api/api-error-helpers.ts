/**
 * Shared helpers for REST API error handling
 */

import * as Sentry from '@sentry/node';
import type { Response } from 'express';
import { logger } from '../observability/logger.js';
import { HttpError } from './errors.js';

/**
 * Answer an error as `{ success: false, error }` with the matching status.
 * Errors that are not HttpErrors become 500 and are reported.
 */
export async function handleApiError(error: unknown, res: Response): Promise<void> {
  if (error instanceof HttpError) {
    if (error.status >= 500) {
      logger.error('OAuth API error', { error: error.message, status: error.status });
      Sentry.captureException(error);
    }
    res.status(error.status).json({ success: false, error: error.message });
    return;
  }

  const message = error instanceof Error ? error.message : String(error);
  logger.error('Unexpected OAuth API error', {
    error: message,
    stack: error instanceof Error ? error.stack : undefined,
  });
  Sentry.captureException(error);

  res.status(500).json({
    success: false,
    error: message,
    details: process.env.NODE_ENV === 'development' && error instanceof Error ? error.stack : undefined,
  });
}

/**
 * Normalize a query value to its list of strings (`?scope=a&scope=b`)
 */
export function queryValues(value: unknown): string[] {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string');
  }
  return [];
}

/**
 * First string value of a query parameter, if any
 */
export function queryValue(value: unknown): string | undefined {
  return queryValues(value)[0];
}
