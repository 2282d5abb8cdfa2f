import { Request, Response, NextFunction } from 'express';
import { AuthError } from '../modules/auth/auth.errors';
import { AuthService } from '../modules/auth/auth.service';
import { AuthRequest } from '../types/request.types';
import { ResponseHandler } from '../utils/response';

export const extractBearerToken = (req: Request): string | undefined => {
  const [scheme, token] = (req.headers.authorization || '').split(' ');
  return scheme === 'Bearer' && token ? token : undefined;
};

export const createAuthMiddleware = (auth: AuthService) => {
  const authenticate = async (req: AuthRequest, res: Response, next: NextFunction) => {
    const token = extractBearerToken(req);

    if (!token) {
      return ResponseHandler.unauthorized(res, new AuthError('UNAUTHENTICATED').message, 'UNAUTHENTICATED');
    }

    try {
      req.user = await auth.resolveSession(token);
    } catch (error) {
      if (error instanceof AuthError) {
        return ResponseHandler.unauthorized(res, error.message, error.code);
      }
      return next(error);
    }

    next();
  };

  // Resolves the session when a valid token is present, never blocks the request
  const optionalAuthenticate = async (req: AuthRequest, _res: Response, next: NextFunction) => {
    const token = extractBearerToken(req);

    if (token) {
      try {
        req.user = await auth.resolveSession(token);
      } catch (error) {
        if (!(error instanceof AuthError)) {
          return next(error);
        }
        req.user = undefined;
      }
    }

    next();
  };

  return { authenticate, optionalAuthenticate };
};

export type AuthMiddleware = ReturnType<typeof createAuthMiddleware>;
