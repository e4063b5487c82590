import type { MiddlewareHandler } from 'hono';
import { logger } from './logger.js';

export type AppEnv = {
  Variables: {
    /** Aborts when the request deadline passes. Handed to every lookup. */
    signal: AbortSignal;
  };
};

/**
 * Give each request an AbortSignal that fires after `timeoutMs`.
 */
export function requestDeadline(timeoutMs: number): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set('signal', AbortSignal.timeout(timeoutMs));
    await next();
  };
}

/**
 * Log method, path, status and duration of every request.
 */
export function requestLogger(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();
    await next();
    const status = c.res.status;
    const context = {
      method: c.req.method,
      path: c.req.path,
      status,
      duration: `${Date.now() - start}ms`,
    };
    if (status >= 500) {
      logger.warn('Request completed', context);
    } else {
      logger.info('Request completed', context);
    }
  };
}
