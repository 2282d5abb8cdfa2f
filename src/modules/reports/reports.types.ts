/**
 * Types shared by the report filter, query and formatter layers
 */

export const MOVEMENT_TYPES = ['all', 'inbound', 'outbound'] as const;
export type MovementType = (typeof MOVEMENT_TYPES)[number];

export type ReportLocale = 'en-US' | 'pt-BR';

export type AveragePriceMode = 'monthly' | 'product';

/**
 * Normalized, fully-defaulted report parameters.
 * Dates are ISO calendar dates (YYYY-MM-DD); accountId and product are the
 * raw text the client sent, empty when absent.
 */
export interface CanonicalFilter {
  startDate: string;
  endDate: string;
  accountId: string;
  product: string;
  movementType: MovementType;
}

export interface SqlQuery {
  text: string;
  values: unknown[];
}

/** Placeholder shown for an absent date or account */
export const EMPTY_CELL = '-';
export type AccountCell = number | typeof EMPTY_CELL;

// Raw aggregation rows, as returned by pg (NUMERIC and COUNT as text)

export interface PeriodTotalsRow {
  date: string | null;
  count: string;
  total: string | null;
}

export interface ProductRankingRow {
  product_code: number;
  description: string;
  total_quantity: string | null;
  total_value: string | null;
  average_price: string | null;
}

export interface MonthlyAveragePriceRow {
  year: number;
  month: number;
  count: string;
  average_price: string | null;
  total_value: string | null;
}

export interface ProductAveragePriceRow {
  product_code: number;
  description: string;
  average_price: string | null;
  total_value: string | null;
  count: string;
}

export interface MonthTotalsRow {
  year: number;
  month: number;
  count: string;
  total: string | null;
}

// Display records

export interface PurchaseListItem {
  date: string;
  code: number;
  description: string;
  quantity: number;
  unitPrice: number;
  total: number;
  account: AccountCell;
}

export interface StockMovementListItem {
  date: string;
  code: number;
  description: string;
  quantity: number;
  unitValue: number;
  totalValue: number;
  physicalQuantity: number;
  inbound: number;
  outbound: number;
  balance: number;
  account: AccountCell;
}

export interface PeriodTotalsItem {
  date: string;
  count: number;
  total: number;
  ticketAverage: number;
}

export interface ProductRankingItem {
  code: number;
  description: string;
  totalQuantity: number;
  totalValue: number;
  averagePrice: number;
}

export interface MonthlyAveragePriceItem {
  period: string;
  count: number;
  averagePrice: number;
  totalValue: number;
}

export interface ProductAveragePriceItem {
  code: number;
  description: string;
  averagePrice: number;
  totalValue: number;
  count: number;
}

export type GrowthTrend = 'up' | 'down';

export interface MonthComparisonItem {
  month: string;
  total: number;
  count: number;
  growth: number;
  trend: GrowthTrend;
}

export interface TopPurchaseItem {
  rank: number;
  date: string;
  description: string;
  quantity: number;
  unitPrice: number;
  total: number;
  account: AccountCell;
}

/**
 * What every report operation hands back to the HTTP layer
 */
export interface Report<T> {
  rows: T[];
  filters: CanonicalFilter;
}

export interface PeriodTotalsReport extends Report<PeriodTotalsItem> {
  chart: {
    labels: string[];
    values: number[];
  };
}

export type AveragePriceReport =
  | (Report<MonthlyAveragePriceItem> & { mode: 'monthly' })
  | (Report<ProductAveragePriceItem> & { mode: 'product' });
