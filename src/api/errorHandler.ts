import type { Request, Response, NextFunction } from 'express';
import { isAppError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { Env } from '../infra/env.js';

/**
 * Global error handler middleware
 * Maps domain errors to HTTP status codes with a machine-readable code
 */
export function createErrorHandler(env: Pick<Env, 'NODE_ENV'>) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const context = {
      method: req.method,
      path: req.path,
      ip: req.ip,
      userAgent: req.get('user-agent'),
    };

    if (isAppError(err)) {
      const level = err.statusCode >= 500 ? 'error' : 'warn';
      logger.log(level, 'Application error', {
        code: err.code,
        message: err.message,
        details: err.details,
        stack: env.NODE_ENV === 'development' && err.statusCode >= 500 ? err.stack : undefined,
        ...context,
      });

      res.status(err.statusCode).json({
        error: err.code,
        message: err.message,
        ...(err.details ? { details: err.details } : {}),
      });
    } else {
      // Unknown error - log full details but return generic message
      logger.error('Unexpected error', {
        message: err.message,
        name: err.name,
        stack: err.stack,
        ...context,
      });

      res.status(500).json({
        error: 'INTERNAL_SERVER_ERROR',
        message: env.NODE_ENV === 'development' ? err.message : 'An unexpected error occurred',
      });
    }
  };
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({
    error: 'NOT_FOUND',
    message: 'The requested resource was not found',
  });
}
