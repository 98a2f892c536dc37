import type { ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { HttpError, StorageConnectError } from '../errors.js';
import type { Logger } from '../logger.js';

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (err, req, res, _next) => {
    if (err instanceof ZodError) {
      res.status(400).json({
        message: 'validation_failed',
        issues: err.issues,
      });
      return;
    }

    if (err instanceof HttpError) {
      res.status(err.statusCode).json({
        message: err.message,
        details: err.details,
      });
      return;
    }

    if (err instanceof StorageConnectError) {
      logger.error({ err, method: req.method, path: req.path }, 'storage unreachable');
      res.status(503).json({ message: 'service_unavailable' });
      return;
    }

    logger.error({ err, method: req.method, path: req.path }, 'request failed');
    res.status(500).json({ message: 'internal_error' });
  };
}
