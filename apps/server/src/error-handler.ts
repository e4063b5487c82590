import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { logger, toError } from './logger.js';

/**
 * Error carrying the HTTP status it should be reported with.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    readonly status: ContentfulStatusCode,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class BadRequestError extends HttpError {
  constructor(message: string) {
    super(message, 400);
  }
}

function isContentfulStatus(status: number): status is ContentfulStatusCode {
  return Number.isInteger(status) && status >= 400 && status < 600;
}

/**
 * Get HTTP status code from error
 */
export function getErrorStatusCode(error: unknown): ContentfulStatusCode {
  if (error instanceof HttpError || error instanceof HTTPException) {
    return isContentfulStatus(error.status) ? error.status : 500;
  }
  return 500;
}

/**
 * Message sent to the client. Client errors are always explained; server
 * errors only outside production.
 */
export function sanitizeErrorMessage(
  error: unknown,
  status: number,
  isProduction: boolean,
  defaultMessage = 'An error occurred',
): string {
  if (status < 500) {
    return toError(error).message || defaultMessage;
  }
  if (isProduction) {
    return defaultMessage;
  }
  return toError(error).message || defaultMessage;
}

/**
 * Log error and return the JSON error response for it
 */
export function handleError(
  c: Context,
  error: unknown,
  options: { isProduction: boolean; defaultMessage?: string } = { isProduction: false },
): Response {
  const status = getErrorStatusCode(error);
  const message = sanitizeErrorMessage(error, status, options.isProduction, options.defaultMessage);

  const context = { path: c.req.path, method: c.req.method, status, error };
  if (status >= 500) {
    logger.error('Request error', context);
  } else {
    logger.debug('Request rejected', { ...context, error: undefined, reason: message });
  }

  return c.json({ error: message }, status);
}
