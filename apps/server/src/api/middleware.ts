import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import type { Logger } from 'pino';
import { isFormValidationError } from '@stepwise/core/ports';

/**
 * Request ID middleware for tracing
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = req.get('x-request-id') ?? randomUUID();
  res.setHeader('X-Request-ID', requestId);
  next();
}

/**
 * Global error handler middleware
 */
export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  const log = logger.child({ component: 'errorHandler' });

  return (err: unknown, req, res, _next) => {
    // Validation failures are normally answered by the wizard handler itself
    if (isFormValidationError(err)) {
      res.status(err.statusCode).json({ message: err.message, errors: err.errors });
      return;
    }

    const error = err instanceof Error ? err : new Error(String(err));
    log.error(
      {
        error: error.message,
        stack: error.stack,
        path: req.path,
        method: req.method,
      },
      'Request error'
    );

    // Generic error response (don't leak internal details)
    res.status(500).json({ error: 'Internal server error' });
  };
}

/**
 * 404 handler for unmatched routes
 */
export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'Not found' });
}
