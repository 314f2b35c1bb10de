/**
 * API middleware: request logging, the not-found fallback and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { INTERNAL_ERROR_MESSAGE, sendApiError } from '../domain/errors';
import { Logger, logger } from '../logger';

/** Log one line per completed request. Health probes are logged at debug. */
export function requestLogger(log: Logger = logger) {
  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      const context = {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - started,
      };
      if (req.path === '/health') {
        log.debug('Request completed', context);
      } else {
        log.info('Request completed', context);
      }
    });
    next();
  };
}

/** Unmatched routes answer with the error envelope instead of Express's HTML page. */
export function notFoundHandler(req: Request, res: Response) {
  sendApiError(res, 404, `Route not found: ${req.method} ${req.path}`);
}

/**
 * Errors raised by body-parser carry an HTTP status and an `expose` flag
 * telling whether the message is safe to return.
 */
interface HttpError {
  status: number;
  message: string;
  expose: boolean;
}

function asHttpError(err: unknown): HttpError | undefined {
  if (!(err instanceof Error)) return undefined;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status !== 'number' || status < 400 || status > 599) return undefined;
  const expose = 'expose' in err && err.expose === true;
  return { status, message: err.message, expose };
}

/**
 * Global error handling middleware. Once headers are out the envelope can no
 * longer be written, so the error goes to Express's final handler.
 */
export function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction) {
  if (res.headersSent) {
    logger.error('Request error after response started', {
      message: err instanceof Error ? err.message : String(err),
    });
    next(err);
    return;
  }

  const httpError = asHttpError(err);
  if (httpError && httpError.expose) {
    logger.warn('Request error', { status: httpError.status, message: httpError.message });
    sendApiError(res, httpError.status, httpError.message);
    return;
  }

  logger.error('Unhandled request error', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });
  sendApiError(res, httpError?.status ?? 500, INTERNAL_ERROR_MESSAGE);
}
