import { format, isValid, parse, subDays } from 'date-fns';
import { z } from 'zod';
import { loggingConfig } from '../../utils/logging';
import { AveragePriceMode, CanonicalFilter, MOVEMENT_TYPES } from './reports.types';

const logger = loggingConfig.getLogger('report-filters');

const ISO_DATE_FORMAT = 'yyyy-MM-dd';
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const DEFAULT_RANGE_DAYS = 365;

// account_id is an INTEGER column
const INT4_MIN = -2147483648;
const INT4_MAX = 2147483647;

// Repeated query parameters (?a=1&a=2) keep their first value
const firstValue = (value: unknown): unknown => (Array.isArray(value) ? value[0] : value);

const textParam = z.preprocess(firstValue, z.string()).catch('');

const rawFilterSchema = z.object({
  start_date: textParam,
  end_date: textParam,
  account_id: textParam,
  product: textParam,
  movement_type: z.preprocess(firstValue, z.enum(MOVEMENT_TYPES)).catch('all'),
});

/**
 * Parse a YYYY-MM-DD calendar date.
 * Returns the normalized ISO string, or null for anything else
 * (wrong shape, impossible day such as 2026-02-30).
 */
export const parseIsoDate = (value: string): string | null => {
  const trimmed = value.trim();
  if (!ISO_DATE_PATTERN.test(trimmed)) {
    return null;
  }

  const date = parse(trimmed, ISO_DATE_FORMAT, new Date());
  return isValid(date) ? format(date, ISO_DATE_FORMAT) : null;
};

/**
 * Account filters are kept as text on the canonical filter and only turned
 * into an integer when a query is built. Non-integers disable the filter.
 */
export const parseAccountId = (value: string): number | null => {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }

  const accountId = Number(trimmed);
  if (accountId < INT4_MIN || accountId > INT4_MAX) {
    return null;
  }
  // "-0" parses to negative zero
  return accountId === 0 ? 0 : accountId;
};

const resolveDate = (name: string, value: string, fallback: string): string => {
  if (!value) {
    return fallback;
  }

  const parsed = parseIsoDate(value);
  if (parsed === null) {
    logger.debug(`[Filters] Ignoring malformed ${name}`, { value, fallback });
    return fallback;
  }
  return parsed;
};

/**
 * Build the canonical filter from raw request parameters.
 * Never throws: missing or malformed values fall back to defaults
 * (last 365 days, no account, no product, all movements).
 */
export const normalizeFilters = (
  raw: Record<string, unknown> | undefined,
  now: Date = new Date()
): CanonicalFilter => {
  const params = rawFilterSchema.parse(raw ?? {});

  return {
    startDate: resolveDate(
      'start_date',
      params.start_date,
      format(subDays(now, DEFAULT_RANGE_DAYS), ISO_DATE_FORMAT)
    ),
    endDate: resolveDate('end_date', params.end_date, format(now, ISO_DATE_FORMAT)),
    accountId: params.account_id,
    product: params.product,
    movementType: params.movement_type,
  };
};

/**
 * Average-price report mode: monthly unless another mode is named,
 * any other value selects the per-product comparison.
 */
export const parseAveragePriceMode = (value: unknown): AveragePriceMode => {
  const mode = firstValue(value);
  return mode === undefined || mode === '' || mode === 'monthly' ? 'monthly' : 'product';
};
