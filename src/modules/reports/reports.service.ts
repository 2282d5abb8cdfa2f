import { Database } from '../../connections/db/connection';
import { Purchase } from '../../connections/db/models/purchase.model';
import { StockMovement } from '../../connections/db/models/stock-movement.model';
import {
  formatMonthComparison,
  formatMonthlyAveragePrice,
  formatPeriodTotals,
  formatProductAveragePrice,
  formatProductRanking,
  formatPurchaseListing,
  formatStockMovementListing,
  formatTopPurchases,
} from './reports.formatter';
import {
  buildMonthlyAveragePriceQuery,
  buildMonthTotalsQuery,
  buildPeriodTotalsQuery,
  buildProductAveragePriceQuery,
  buildProductRankingQuery,
  buildPurchaseListingQuery,
  buildStockMovementListingQuery,
  buildTopPurchasesQuery,
  PRODUCT_AVERAGE_PRICE_LIMIT,
  PRODUCT_RANKING_LIMIT,
  TOP_PURCHASES_LIMIT,
} from './reports.queries';
import {
  AveragePriceMode,
  AveragePriceReport,
  CanonicalFilter,
  MonthComparisonItem,
  MonthlyAveragePriceRow,
  MonthTotalsRow,
  PeriodTotalsReport,
  PeriodTotalsRow,
  ProductAveragePriceRow,
  ProductRankingItem,
  ProductRankingRow,
  PurchaseListItem,
  Report,
  ReportLocale,
  SqlQuery,
  StockMovementListItem,
  TopPurchaseItem,
} from './reports.types';

export interface ReportsService {
  listPurchases(filters: CanonicalFilter): Promise<Report<PurchaseListItem>>;
  listStockMovements(filters: CanonicalFilter): Promise<Report<StockMovementListItem>>;
  purchasesByPeriod(filters: CanonicalFilter): Promise<PeriodTotalsReport>;
  productRanking(filters: CanonicalFilter): Promise<Report<ProductRankingItem>>;
  averagePrice(filters: CanonicalFilter, mode: AveragePriceMode): Promise<AveragePriceReport>;
  monthComparison(filters: CanonicalFilter): Promise<Report<MonthComparisonItem>>;
  topPurchases(filters: CanonicalFilter): Promise<Report<TopPurchaseItem>>;
}

export interface ReportsServiceOptions {
  locale: ReportLocale;
}

/**
 * Each report is a single parameterized statement; rows are formatted only
 * after the storage engine returns them. Top-N reports are capped again
 * here. Storage errors propagate as-is.
 */
export const createReportsService = (db: Database, options: ReportsServiceOptions): ReportsService => {
  const run = <R extends object>(query: SqlQuery) => db.query<R & Record<string, unknown>>(query.text, query.values);

  return {
    async listPurchases(filters) {
      const rows = await run<Purchase>(buildPurchaseListingQuery(filters));
      return { rows: formatPurchaseListing(rows), filters };
    },

    async listStockMovements(filters) {
      const rows = await run<StockMovement>(buildStockMovementListingQuery(filters));
      return { rows: formatStockMovementListing(rows), filters };
    },

    async purchasesByPeriod(filters) {
      const rows = formatPeriodTotals(await run<PeriodTotalsRow>(buildPeriodTotalsQuery(filters)));
      return {
        rows,
        filters,
        chart: {
          labels: rows.map(row => row.date),
          values: rows.map(row => row.total),
        },
      };
    },

    async productRanking(filters) {
      const rows = await run<ProductRankingRow>(buildProductRankingQuery(filters));
      return { rows: formatProductRanking(rows.slice(0, PRODUCT_RANKING_LIMIT)), filters };
    },

    async averagePrice(filters, mode) {
      if (mode === 'monthly') {
        const rows = await run<MonthlyAveragePriceRow>(buildMonthlyAveragePriceQuery(filters));
        return { mode, rows: formatMonthlyAveragePrice(rows, options.locale), filters };
      }

      const rows = await run<ProductAveragePriceRow>(buildProductAveragePriceQuery(filters));
      return { mode, rows: formatProductAveragePrice(rows.slice(0, PRODUCT_AVERAGE_PRICE_LIMIT)), filters };
    },

    async monthComparison(filters) {
      const rows = await run<MonthTotalsRow>(buildMonthTotalsQuery(filters));
      return { rows: formatMonthComparison(rows, options.locale), filters };
    },

    async topPurchases(filters) {
      const rows = await run<Purchase>(buildTopPurchasesQuery(filters));
      return { rows: formatTopPurchases(rows.slice(0, TOP_PURCHASES_LIMIT)), filters };
    },
  };
};
