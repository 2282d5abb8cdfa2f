import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { ZodError } from 'zod';
import { AuthError } from '../modules/auth/auth.errors';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

const readStatus = (err: unknown): number => {
  if (typeof err === 'object' && err !== null) {
    if ('status' in err && typeof err.status === 'number') return err.status;
    if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  }
  return 500;
};

/**
 * Last-resort handler. Storage failures reach here unmodified and are
 * answered with a generic 500; the stack is only exposed in development.
 */
export const createErrorHandler = (nodeEnv: string): ErrorRequestHandler => {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const error = err instanceof Error ? err : new Error(String(err));

    logger.error('[Error Handler]', {
      message: error.message,
      stack: error.stack,
      url: req.originalUrl,
      method: req.method,
      ip: req.ip,
      userAgent: req.get('user-agent'),
      query: req.query,
    });

    if (err instanceof ZodError) {
      return ResponseHandler.validationError(res, err.issues);
    }

    if (err instanceof AuthError) {
      return ResponseHandler.error(res, err.message, err.statusCode, { code: err.code });
    }

    const statusCode = readStatus(err);

    // Malformed JSON bodies from express.json()
    if (statusCode === 400) {
      return ResponseHandler.badRequest(res, 'Malformed request body');
    }

    if (statusCode < 500) {
      return ResponseHandler.error(res, error.message, statusCode, { code: 'REQUEST_ERROR' });
    }

    return ResponseHandler.error(res, 'Internal server error', 500, {
      code: 'INTERNAL_ERROR',
      details: nodeEnv === 'development' ? error.stack : undefined,
    });
  };
};

export const notFoundHandler = (req: Request, res: Response, _next: NextFunction) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
