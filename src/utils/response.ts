import { Response } from 'express';
import { logger } from './logging';

export interface ApiErrorBody {
  code?: string;
  details?: unknown;
}

/**
 * Uniform JSON envelope for every endpoint
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: ApiErrorBody;
}

export class ResponseHandler {
  static success<T>(
    res: Response,
    data?: T,
    message: string = 'Success',
    statusCode: number = 200
  ): Response {
    const response: ApiResponse<T> = {
      success: true,
      message,
      data,
    };

    return res.status(statusCode).json(response);
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: ApiErrorBody
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
    };

    // 4xx are expected client mistakes
    const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`[API Error] ${message}`, {
      statusCode,
      code: error?.code,
    });

    return res.status(statusCode).json(response);
  }

  static badRequest(
    res: Response,
    message: string = 'Invalid request',
    details?: unknown
  ): Response {
    return this.error(res, message, 400, {
      code: 'BAD_REQUEST',
      details,
    });
  }

  static validationError(
    res: Response,
    errors: unknown[],
    message: string = 'Invalid data'
  ): Response {
    return this.error(res, message, 400, {
      code: 'VALIDATION_ERROR',
      details: errors,
    });
  }

  static unauthorized(
    res: Response,
    message: string = 'Not authenticated',
    code: string = 'UNAUTHORIZED'
  ): Response {
    return this.error(res, message, 401, { code });
  }

  static notFound(
    res: Response,
    message: string = 'Not found'
  ): Response {
    return this.error(res, message, 404, {
      code: 'NOT_FOUND',
    });
  }

  static tooManyRequests(
    res: Response,
    message: string = 'Too many requests',
    retryAfter?: number
  ): Response {
    if (retryAfter) {
      res.setHeader('Retry-After', retryAfter.toString());
    }

    return this.error(res, message, 429, {
      code: 'TOO_MANY_REQUESTS',
      details: retryAfter ? { retryAfter } : undefined,
    });
  }

  static internalError(
    res: Response,
    message: string = 'Internal server error',
    error?: unknown
  ): Response {
    logger.error('[Internal Server Error]', {
      message,
      error: error instanceof Error ? error.stack : error,
    });

    return this.error(res, message, 500, {
      code: 'INTERNAL_ERROR',
    });
  }
}
