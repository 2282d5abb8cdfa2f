import express from 'express';
import { AuthMiddleware } from '../../middlewares/auth.middleware';
import { ReportsController } from './reports.controller';

export const createPurchaseRoutes = (reports: ReportsController, { authenticate }: AuthMiddleware) => {
  const router = express.Router();

  router.use(authenticate);

  router.get('/', reports.listPurchases);
  router.get('/by-period', reports.purchasesByPeriod);
  router.get('/product-ranking', reports.productRanking);
  // ?mode=monthly (default) | product
  router.get('/average-price', reports.averagePrice);
  router.get('/month-comparison', reports.monthComparison);
  router.get('/top', reports.topPurchases);

  return router;
};

export const createStockMovementRoutes = (reports: ReportsController, { authenticate }: AuthMiddleware) => {
  const router = express.Router();

  router.use(authenticate);

  router.get('/', reports.listStockMovements);

  return router;
};
