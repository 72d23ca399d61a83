/**
 * Query-string validation for every endpoint
 */

import { z } from 'zod';
import { ValidationError, isIsoDate } from '@quotebook/contracts';

function required(name: string) {
  return z
    .string({
      required_error: `Missing required parameter: ${name}`,
      invalid_type_error: `Invalid parameter: ${name} must be given once`,
    })
    .trim()
    .min(1, `Missing required parameter: ${name}`);
}

function isoDate(name: string) {
  return required(name).refine(isIsoDate, `Invalid ${name}: expected a YYYY-MM-DD calendar date`);
}

/**
 * An empty value (`?t=`) counts as absent
 */
function optionalIsoDate(name: string) {
  return z.preprocess((value) => (value === '' ? undefined : value), isoDate(name).optional());
}

export const pricesQuery = z
  .object({
    ticker: required('ticker'),
    t: optionalIsoDate('t'),
    start_date: optionalIsoDate('start_date'),
    end_date: optionalIsoDate('end_date'),
  })
  .transform(({ ticker, t, start_date, end_date }) => ({
    ticker,
    start: t ?? start_date,
    end: end_date,
  }))
  .refine(({ start, end }) => start === undefined || end === undefined || start <= end, {
    message: 'Invalid range: start date is after end_date',
  });

export const tickerQuery = z.object({
  ticker: required('ticker'),
});

export const latestPricesQuery = z.object({
  market_type: required('market_type'),
  date: isoDate('date'),
});

export const signalTypeQuery = z.object({
  type: required('type'),
  signal_type: required('signal_type'),
});

export const tradeHistoryQuery = signalTypeQuery
  .extend({
    start_date: isoDate('start_date'),
    end_date: isoDate('end_date'),
  })
  .refine(({ start_date, end_date }) => start_date <= end_date, {
    message: 'Invalid range: start_date is after end_date',
  });

export const profitsQuery = signalTypeQuery.extend({
  start_date: isoDate('start_date'),
  uid: required('uid'),
});

export const marketTypeQuery = z.object({
  market_type: required('market_type'),
});

/**
 * Parse a query object or throw a ValidationError carrying the first
 * problem found.
 */
export function parseQuery<S extends z.ZodTypeAny>(schema: S, query: unknown): z.output<S> {
  const result = schema.safeParse(query);
  if (!result.success) {
    const [first] = result.error.issues;
    throw new ValidationError(first?.message ?? 'Invalid request parameters', {
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return result.data;
}
