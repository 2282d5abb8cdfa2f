import express from 'express';
import { AppConfig } from '../connections/config/app.config';
import { createAuthMiddleware } from '../middlewares/auth.middleware';
import { createAuthController } from '../modules/auth/auth.controller';
import { createAuthRoutes } from '../modules/auth/auth.routes';
import { AuthService } from '../modules/auth/auth.service';
import { createReportsController } from '../modules/reports/reports.controller';
import { createPurchaseRoutes, createStockMovementRoutes } from '../modules/reports/reports.routes';
import { ReportsService } from '../modules/reports/reports.service';

export interface RouterDependencies {
  config: AppConfig;
  auth: AuthService;
  reports: ReportsService;
}

export const createRouter = ({ config, auth, reports }: RouterDependencies) => {
  const router = express.Router();
  const authMiddleware = createAuthMiddleware(auth);
  const reportsController = createReportsController(reports);

  // API Routes
  router.use('/auth', createAuthRoutes(createAuthController(auth), authMiddleware, {
    loginRateLimit: config.loginRateLimit,
  }));
  router.use('/purchases', createPurchaseRoutes(reportsController, authMiddleware));
  router.use('/stock-movements', createStockMovementRoutes(reportsController, authMiddleware));

  return router;
};
