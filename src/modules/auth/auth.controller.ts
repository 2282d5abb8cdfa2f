import { Response } from 'express';
import { ZodError } from 'zod';
import { extractBearerToken } from '../../middlewares/auth.middleware';
import { AuthRequest } from '../../types/request.types';
import { CurrentUserResponse, LoginResponse } from '../../types/response.types';
import { auditLog, logger } from '../../utils/logging';
import { ResponseHandler } from '../../utils/response';
import { AuthError } from './auth.errors';
import { AuthService } from './auth.service';
import { loginSchema } from './auth.validation';

const firstQueryValue = (value: unknown): string | undefined => {
  const first = Array.isArray(value) ? value[0] : value;
  return typeof first === 'string' ? first : undefined;
};

export const createAuthController = (auth: AuthService) => {
  const login = async (req: AuthRequest, res: Response) => {
    try {
      const { username, password, next } = loginSchema.parse(req.body ?? {});
      const result = await auth.authenticate(username, password, next ?? firstQueryValue(req.query.next));

      auditLog('USER_LOGIN', {
        userId: result.user.id,
        username: result.user.username,
        ip: req.ip,
      });

      const responseData: LoginResponse = {
        token: result.token,
        expiresAt: result.expiresAt.toISOString(),
        redirectTo: result.redirectTo,
        user: result.user,
      };

      return ResponseHandler.success(res, responseData, `Welcome, ${result.user.username}!`);
    } catch (error) {
      if (error instanceof ZodError) {
        return ResponseHandler.validationError(res, error.issues);
      }
      if (error instanceof AuthError) {
        return ResponseHandler.error(res, error.message, error.statusCode, { code: error.code });
      }
      return ResponseHandler.internalError(res, 'Failed to log in', error);
    }
  };

  // Safe to call without an active session
  const logout = async (req: AuthRequest, res: Response) => {
    try {
      await auth.logout(extractBearerToken(req));

      if (req.user) {
        auditLog('USER_LOGOUT', {
          userId: req.user.id,
          ip: req.ip,
        });
      } else {
        logger.debug('[Logout] No active session');
      }

      return ResponseHandler.success(res, null, 'You have been logged out');
    } catch (error) {
      return ResponseHandler.internalError(res, 'Failed to log out', error);
    }
  };

  const getCurrentUser = async (req: AuthRequest, res: Response) => {
    if (!req.user) {
      return ResponseHandler.unauthorized(res);
    }

    const responseData: CurrentUserResponse = {
      user: { id: req.user.id, username: req.user.username },
    };
    return ResponseHandler.success(res, responseData);
  };

  return { login, logout, getCurrentUser };
};

export type AuthController = ReturnType<typeof createAuthController>;
