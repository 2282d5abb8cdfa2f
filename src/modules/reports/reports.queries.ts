import { parseAccountId } from './reports.filters';
import { CanonicalFilter, SqlQuery } from './reports.types';

export const PRODUCT_RANKING_LIMIT = 20;
export const PRODUCT_AVERAGE_PRICE_LIMIT = 15;
export const TOP_PURCHASES_LIMIT = 10;

type ReportTable = 'purchases' | 'stock_movements';

interface ConditionOptions {
  account?: boolean;
  product?: boolean;
  movementType?: boolean;
}

/**
 * Collects positional parameters and hands out their $n placeholders
 */
class QueryParams {
  readonly values: unknown[] = [];

  add(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

/**
 * LIKE pattern matching the term as a literal substring
 */
export const toSearchPattern = (term: string): string =>
  `%${term.replace(/[\\%_]/g, match => `\\${match}`)}%`;

/**
 * WHERE conditions shared by every report. The date range always applies;
 * the other filters only where the report asks for them.
 */
const buildConditions = (
  table: ReportTable,
  filter: CanonicalFilter,
  params: QueryParams,
  options: ConditionOptions = {}
): string => {
  const conditions = [
    `${table}.date BETWEEN ${params.add(filter.startDate)} AND ${params.add(filter.endDate)}`,
  ];

  if (options.account) {
    const accountId = parseAccountId(filter.accountId);
    if (accountId !== null) {
      conditions.push(`${table}.account_id = ${params.add(accountId)}`);
    }
  }

  if (options.product && filter.product) {
    const pattern = params.add(toSearchPattern(filter.product));
    conditions.push(`(${table}.description ILIKE ${pattern} OR ${table}.product_code::text ILIKE ${pattern})`);
  }

  if (options.movementType) {
    if (filter.movementType === 'inbound') {
      conditions.push(`${table}.inbound_quantity > 0`);
    } else if (filter.movementType === 'outbound') {
      conditions.push(`${table}.outbound_quantity > 0`);
    }
  }

  return conditions.join(' AND ');
};

export const buildPurchaseListingQuery = (filter: CanonicalFilter): SqlQuery => {
  const params = new QueryParams();
  const where = buildConditions('purchases', filter, params, { account: true, product: true });

  return {
    text: `SELECT id, product_code, description, quantity, unit_price, total_value,
       to_char(purchases.date, 'YYYY-MM-DD') AS date, account_id, user_id
FROM purchases
WHERE ${where}
ORDER BY purchases.date DESC, purchases.id DESC`,
    values: params.values,
  };
};

export const buildStockMovementListingQuery = (filter: CanonicalFilter): SqlQuery => {
  const params = new QueryParams();
  const where = buildConditions('stock_movements', filter, params, {
    account: true,
    product: true,
    movementType: true,
  });

  return {
    text: `SELECT id, product_code, description, quantity, unit_value, total_value,
       physical_quantity, inbound_quantity, outbound_quantity,
       to_char(stock_movements.date, 'YYYY-MM-DD') AS date, account_id, user_id
FROM stock_movements
WHERE ${where}
ORDER BY stock_movements.date DESC, stock_movements.id DESC`,
    values: params.values,
  };
};

export const buildPeriodTotalsQuery = (filter: CanonicalFilter): SqlQuery => {
  const params = new QueryParams();
  const where = buildConditions('purchases', filter, params);

  return {
    text: `SELECT to_char(purchases.date, 'YYYY-MM-DD') AS date,
       COUNT(purchases.id) AS count,
       SUM(purchases.total_value) AS total
FROM purchases
WHERE ${where}
GROUP BY purchases.date
ORDER BY purchases.date DESC`,
    values: params.values,
  };
};

export const buildProductRankingQuery = (filter: CanonicalFilter): SqlQuery => {
  const params = new QueryParams();
  const where = buildConditions('purchases', filter, params, { product: true });
  const limit = params.add(PRODUCT_RANKING_LIMIT);

  return {
    text: `SELECT product_code, description,
       SUM(quantity) AS total_quantity,
       SUM(total_value) AS total_value,
       AVG(unit_price) AS average_price
FROM purchases
WHERE ${where}
GROUP BY product_code, description
ORDER BY SUM(quantity) DESC, product_code ASC
LIMIT ${limit}`,
    values: params.values,
  };
};

export const buildMonthlyAveragePriceQuery = (filter: CanonicalFilter): SqlQuery => {
  const params = new QueryParams();
  const where = buildConditions('purchases', filter, params);

  return {
    text: `SELECT EXTRACT(YEAR FROM purchases.date)::int AS year,
       EXTRACT(MONTH FROM purchases.date)::int AS month,
       COUNT(purchases.id) AS count,
       AVG(purchases.unit_price) AS average_price,
       SUM(purchases.total_value) AS total_value
FROM purchases
WHERE ${where}
GROUP BY year, month
ORDER BY year DESC, month DESC`,
    values: params.values,
  };
};

export const buildProductAveragePriceQuery = (filter: CanonicalFilter): SqlQuery => {
  const params = new QueryParams();
  const where = buildConditions('purchases', filter, params);
  const limit = params.add(PRODUCT_AVERAGE_PRICE_LIMIT);

  return {
    text: `SELECT product_code, description,
       AVG(unit_price) AS average_price,
       SUM(total_value) AS total_value,
       COUNT(id) AS count
FROM purchases
WHERE ${where}
GROUP BY product_code, description
ORDER BY AVG(unit_price) DESC, product_code ASC
LIMIT ${limit}`,
    values: params.values,
  };
};

export const buildMonthTotalsQuery = (filter: CanonicalFilter): SqlQuery => {
  const params = new QueryParams();
  const where = buildConditions('purchases', filter, params);

  return {
    text: `SELECT EXTRACT(YEAR FROM purchases.date)::int AS year,
       EXTRACT(MONTH FROM purchases.date)::int AS month,
       COUNT(purchases.id) AS count,
       SUM(purchases.total_value) AS total
FROM purchases
WHERE ${where}
GROUP BY year, month
ORDER BY year ASC, month ASC`,
    values: params.values,
  };
};

export const buildTopPurchasesQuery = (filter: CanonicalFilter): SqlQuery => {
  const params = new QueryParams();
  const where = buildConditions('purchases', filter, params);
  const limit = params.add(TOP_PURCHASES_LIMIT);

  return {
    text: `SELECT id, product_code, description, quantity, unit_price, total_value,
       to_char(purchases.date, 'YYYY-MM-DD') AS date, account_id, user_id
FROM purchases
WHERE ${where}
ORDER BY purchases.total_value DESC, purchases.id ASC
LIMIT ${limit}`,
    values: params.values,
  };
};
