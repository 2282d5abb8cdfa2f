import Decimal from 'decimal.js';
import { format, parse } from 'date-fns';
import type { Locale } from 'date-fns';
import { enUS, ptBR } from 'date-fns/locale';
import { Purchase } from '../../connections/db/models/purchase.model';
import { StockMovement } from '../../connections/db/models/stock-movement.model';
import {
  AccountCell,
  EMPTY_CELL,
  MonthComparisonItem,
  MonthlyAveragePriceItem,
  MonthlyAveragePriceRow,
  MonthTotalsRow,
  PeriodTotalsItem,
  PeriodTotalsRow,
  ProductAveragePriceItem,
  ProductAveragePriceRow,
  ProductRankingItem,
  ProductRankingRow,
  PurchaseListItem,
  ReportLocale,
  StockMovementListItem,
  TopPurchaseItem,
} from './reports.types';

const LOCALES: Record<ReportLocale, Locale> = {
  'en-US': enUS,
  'pt-BR': ptBR,
};

type DecimalInput = Decimal.Value | null | undefined;

/**
 * Round half-up to `scale` digits and convert to a JS number.
 * Absent values format as 0.
 */
export const formatDecimal = (value: DecimalInput, scale: number = 2): number => {
  if (value === null || value === undefined) {
    return 0;
  }

  const result = new Decimal(value).toDecimalPlaces(scale, Decimal.ROUND_HALF_UP).toNumber();
  // -0.001 rounds to -0
  return result === 0 ? 0 : result;
};

/**
 * YYYY-MM-DD -> DD/MM/YYYY, '-' when absent
 */
export const formatDisplayDate = (isoDate: string | null): string => {
  if (!isoDate) {
    return EMPTY_CELL;
  }
  return format(parse(isoDate, 'yyyy-MM-dd', new Date()), 'dd/MM/yyyy');
};

export const formatMonthLabel = (
  year: number,
  month: number,
  pattern: string,
  locale: ReportLocale
): string => {
  // The Date constructor maps years 0-99 onto 1900-1999
  const date = new Date(2000, 0, 1);
  date.setFullYear(year, month - 1, 1);
  return format(date, pattern, { locale: LOCALES[locale] });
};

export const formatAccount = (accountId: number | null): AccountCell =>
  accountId === null ? EMPTY_CELL : accountId;

export const computeBalance = (inbound: Decimal.Value, outbound: Decimal.Value): number =>
  formatDecimal(new Decimal(inbound).minus(outbound), 3);

/**
 * Mean transaction value of a period, 0 for an empty period
 */
export const computeTicketAverage = (total: DecimalInput, count: number): number => {
  if (count <= 0) {
    return 0;
  }
  return formatDecimal(new Decimal(total ?? 0).dividedBy(count));
};

const toCount = (value: string): number => parseInt(value, 10) || 0;

export const formatPurchaseListing = (rows: Purchase[]): PurchaseListItem[] =>
  rows.map(row => ({
    date: formatDisplayDate(row.date),
    code: row.product_code,
    description: row.description,
    quantity: formatDecimal(row.quantity, 3),
    unitPrice: formatDecimal(row.unit_price),
    total: formatDecimal(row.total_value),
    account: formatAccount(row.account_id),
  }));

export const formatStockMovementListing = (rows: StockMovement[]): StockMovementListItem[] =>
  rows.map(row => ({
    date: formatDisplayDate(row.date),
    code: row.product_code,
    description: row.description,
    quantity: formatDecimal(row.quantity, 3),
    unitValue: formatDecimal(row.unit_value),
    totalValue: formatDecimal(row.total_value),
    physicalQuantity: formatDecimal(row.physical_quantity, 3),
    inbound: formatDecimal(row.inbound_quantity, 3),
    outbound: formatDecimal(row.outbound_quantity, 3),
    balance: computeBalance(row.inbound_quantity, row.outbound_quantity),
    account: formatAccount(row.account_id),
  }));

export const formatPeriodTotals = (rows: PeriodTotalsRow[]): PeriodTotalsItem[] =>
  rows
    .filter(row => row.date !== null)
    .map(row => {
      const count = toCount(row.count);
      return {
        date: formatDisplayDate(row.date),
        count,
        total: formatDecimal(row.total),
        ticketAverage: computeTicketAverage(row.total, count),
      };
    });

export const formatProductRanking = (rows: ProductRankingRow[]): ProductRankingItem[] =>
  rows.map(row => ({
    code: row.product_code,
    description: row.description,
    totalQuantity: formatDecimal(row.total_quantity, 3),
    totalValue: formatDecimal(row.total_value),
    averagePrice: formatDecimal(row.average_price),
  }));

export const formatMonthlyAveragePrice = (
  rows: MonthlyAveragePriceRow[],
  locale: ReportLocale
): MonthlyAveragePriceItem[] =>
  rows.map(row => ({
    period: formatMonthLabel(row.year, row.month, 'MMMM/yyyy', locale),
    count: toCount(row.count),
    averagePrice: formatDecimal(row.average_price),
    totalValue: formatDecimal(row.total_value),
  }));

export const formatProductAveragePrice = (rows: ProductAveragePriceRow[]): ProductAveragePriceItem[] =>
  rows.map(row => ({
    code: row.product_code,
    description: row.description,
    averagePrice: formatDecimal(row.average_price),
    totalValue: formatDecimal(row.total_value),
    count: toCount(row.count),
  }));

/**
 * Month-over-month growth. Rows must be in chronological order; the
 * previous month's total carries forward and growth is 0 whenever that
 * total is not positive (including the first month).
 */
export const formatMonthComparison = (
  rows: MonthTotalsRow[],
  locale: ReportLocale
): MonthComparisonItem[] => {
  let previousTotal = new Decimal(0);

  return rows.map((row): MonthComparisonItem => {
    const total = new Decimal(row.total ?? 0);
    const growth = previousTotal.greaterThan(0)
      ? total.minus(previousTotal).dividedBy(previousTotal).times(100)
      : new Decimal(0);
    previousTotal = total;

    return {
      month: formatMonthLabel(row.year, row.month, 'MMMM yyyy', locale),
      total: formatDecimal(total),
      count: toCount(row.count),
      growth: formatDecimal(growth),
      trend: growth.greaterThanOrEqualTo(0) ? 'up' : 'down',
    };
  });
};

export const formatTopPurchases = (rows: Purchase[]): TopPurchaseItem[] =>
  rows.map((row, index) => ({
    rank: index + 1,
    date: formatDisplayDate(row.date),
    description: row.description,
    quantity: formatDecimal(row.quantity, 3),
    unitPrice: formatDecimal(row.unit_price),
    total: formatDecimal(row.total_value),
    account: formatAccount(row.account_id),
  }));
