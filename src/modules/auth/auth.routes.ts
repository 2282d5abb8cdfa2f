import express from 'express';
import { AuthMiddleware } from '../../middlewares/auth.middleware';
import { rateLimit } from '../../middlewares/rateLimit.middleware';
import { AuthController } from './auth.controller';

export interface AuthRoutesOptions {
  loginRateLimit: {
    windowMs: number;
    maxRequests: number;
  };
}

export const createAuthRoutes = (
  authController: AuthController,
  { authenticate, optionalAuthenticate }: AuthMiddleware,
  options: AuthRoutesOptions
) => {
  const router = express.Router();

  const loginLimiter = rateLimit({
    ...options.loginRateLimit,
    message: 'Too many login attempts. Please try again later.',
  });

  // Login (rate limited)
  router.post('/login', loginLimiter, authController.login);

  // Logout is idempotent, a session is not required
  router.post('/logout', optionalAuthenticate, authController.logout);

  // Get current user
  router.get('/me', authenticate, authController.getCurrentUser);

  return router;
};
