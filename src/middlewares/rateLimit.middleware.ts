import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

interface RateLimitEntry {
  count: number;
  resetTime: number;
}

export interface RateLimitOptions {
  windowMs: number;
  maxRequests: number;
  message?: string;
  now?: () => number;
}

/**
 * Fixed-window rate limiter keyed by path and client IP.
 * Each limiter owns its counters; expired entries are swept on access.
 */
export const rateLimit = ({
  windowMs,
  maxRequests,
  message,
  now = Date.now,
}: RateLimitOptions) => {
  const store = new Map<string, RateLimitEntry>();

  const sweep = (timestamp: number) => {
    store.forEach((entry, key) => {
      if (entry.resetTime < timestamp) {
        store.delete(key);
      }
    });
  };

  return (req: Request, res: Response, next: NextFunction) => {
    const timestamp = now();
    const clientId = req.ip || 'unknown';
    const key = `${req.path}:${clientId}`;

    sweep(timestamp);

    let entry = store.get(key);
    if (!entry) {
      entry = { count: 0, resetTime: timestamp + windowMs };
      store.set(key, entry);
    }

    entry.count++;

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', Math.max(0, maxRequests - entry.count).toString());
    res.setHeader('X-RateLimit-Reset', new Date(entry.resetTime).toISOString());

    if (entry.count > maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - timestamp) / 1000);

      logger.warn('[Rate Limit Exceeded]', {
        clientId,
        path: req.path,
        count: entry.count,
        limit: maxRequests,
      });

      return ResponseHandler.tooManyRequests(
        res,
        message || `Too many requests. Please try again in ${retryAfter} seconds.`,
        retryAfter
      );
    }

    next();
  };
};
