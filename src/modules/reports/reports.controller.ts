import { Request, Response } from 'express';
import { AuthRequest } from '../../types/request.types';
import { ResponseHandler } from '../../utils/response';
import { normalizeFilters, parseAveragePriceMode } from './reports.filters';
import { ReportsService } from './reports.service';
import { CanonicalFilter } from './reports.types';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Filters come from the query string or a form body. A non-empty query
 * value wins; an empty one leaves the form value in place.
 */
export const readFilterParams = (req: Pick<Request, 'body' | 'query'>): Record<string, unknown> => {
  const body: unknown = req.body;
  const params: Record<string, unknown> = isRecord(body) ? { ...body } : {};

  Object.entries(req.query).forEach(([key, value]) => {
    if (value !== undefined && value !== '') {
      params[key] = value;
    }
  });

  return params;
};

type ReportHandler = (req: AuthRequest, res: Response) => Promise<Response>;

const reportHandler = <T>(
  successMessage: string,
  failureMessage: string,
  load: (filters: CanonicalFilter, req: AuthRequest) => Promise<T>
): ReportHandler => {
  return async (req, res) => {
    try {
      const filters = normalizeFilters(readFilterParams(req));
      const report = await load(filters, req);
      return ResponseHandler.success(res, report, successMessage);
    } catch (error) {
      return ResponseHandler.internalError(res, failureMessage, error);
    }
  };
};

export const createReportsController = (reports: ReportsService) => ({
  // Purchase listing
  listPurchases: reportHandler(
    'Purchases retrieved',
    'Failed to load purchases',
    filters => reports.listPurchases(filters)
  ),

  // Stock movement listing with balance
  listStockMovements: reportHandler(
    'Stock movements retrieved',
    'Failed to load stock movements',
    filters => reports.listStockMovements(filters)
  ),

  purchasesByPeriod: reportHandler(
    'Purchase totals by period retrieved',
    'Failed to load purchase totals by period',
    filters => reports.purchasesByPeriod(filters)
  ),

  // Top 20 products by purchased quantity
  productRanking: reportHandler(
    'Product ranking retrieved',
    'Failed to load product ranking',
    filters => reports.productRanking(filters)
  ),

  averagePrice: reportHandler(
    'Average price analysis retrieved',
    'Failed to load average price analysis',
    (filters, req) => reports.averagePrice(filters, parseAveragePriceMode(req.query.mode))
  ),

  monthComparison: reportHandler(
    'Month comparison retrieved',
    'Failed to load month comparison',
    filters => reports.monthComparison(filters)
  ),

  // 10 largest purchases
  topPurchases: reportHandler(
    'Top purchases retrieved',
    'Failed to load top purchases',
    filters => reports.topPurchases(filters)
  ),
});

export type ReportsController = ReturnType<typeof createReportsController>;
