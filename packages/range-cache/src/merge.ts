/**
 * Incremental range merge.
 *
 * A cached range payload covers one contiguous span of a ticker's history.
 * When a request reaches beyond that span, only the missing piece is read
 * from the store, merged into the cached records by date, and the union
 * becomes the new payload.
 */

import { addDays } from '@quotebook/contracts';
import type { IsoDate, MarketRecord, RangePayload } from '@quotebook/contracts';

/**
 * Store access for one ticker's records.
 */
export interface RangeSource<T extends MarketRecord = MarketRecord> {
  /** Earliest date on record, null when the ticker has no rows */
  minDate(): Promise<IsoDate | null>;
  /** Latest date on record, null when the ticker has no rows */
  maxDate(): Promise<IsoDate | null>;
  /** Records with from <= date <= to, ascending */
  fetchRange(from: IsoDate, to: IsoDate): Promise<T[]>;
}

export interface RangeRequest {
  start?: IsoDate;
  end?: IsoDate;
}

export interface MissingBounds {
  start: IsoDate | null;
  end: IsoDate | null;
}

export interface FetchRange {
  from: IsoDate;
  to: IsoDate;
}

export interface RangeMergeResult<T extends MarketRecord = MarketRecord> {
  /** New payload to cache, null when nothing is on record */
  payload: RangePayload<T> | null;
  /** Merged records restricted to the requested bounds */
  records: T[];
  /** Number of records read from the store */
  fetched: number;
  /** Range sent to the store, null when the cache covered the request */
  fetchedRange: FetchRange | null;
}

/**
 * Work out which bounds the cache cannot answer.
 *
 * A bound the caller gave is missing when it lies outside the cached span
 * (or nothing is cached). A bound the caller left open resolves to the
 * earliest / latest date on record and always counts as missing.
 */
export async function resolveMissingBounds<T extends MarketRecord>(
  request: RangeRequest,
  cached: RangePayload<T> | null,
  source: RangeSource<T>
): Promise<MissingBounds> {
  const [start, end] = await Promise.all([
    request.start === undefined
      ? source.minDate()
      : cached === null || request.start < cached.start_date
        ? request.start
        : null,
    request.end === undefined
      ? source.maxDate()
      : cached === null || request.end > cached.end_date
        ? request.end
        : null,
  ]);

  return { start, end };
}

/**
 * The single store range to read, or null when there is nothing to read.
 *
 * With one side missing the range stops a day short of the cached span so
 * already-cached days are not read again; the result still touches the span,
 * keeping the merged payload contiguous.
 *
 * @example
 * ```typescript
 * // cached 2023-01-01..2023-01-31, request starts 2022-12-01
 * planFetch({ start: '2022-12-01', end: null }, cached);
 * // → { from: '2022-12-01', to: '2022-12-31' }
 * ```
 */
export function planFetch(
  missing: MissingBounds,
  cached: RangePayload | null
): FetchRange | null {
  if (missing.start === null && missing.end === null) {
    return null;
  }

  let from: IsoDate | null;
  let to: IsoDate | null;

  if (cached === null || (missing.start !== null && missing.end !== null)) {
    from = missing.start;
    to = missing.end;
  } else if (missing.start !== null) {
    from = missing.start;
    to = addDays(cached.start_date, -1);
  } else {
    from = addDays(cached.end_date, 1);
    to = missing.end;
  }

  if (from === null || to === null || from > to) {
    return null;
  }
  return { from, to };
}

/**
 * Union of two record sets keyed by date; `fetched` wins on a shared date.
 * Output is ascending by date.
 */
export function mergeRecords<T extends MarketRecord>(cached: readonly T[], fetched: readonly T[]): T[] {
  const byDate = new Map<IsoDate, T>();
  for (const record of cached) byDate.set(record.date, record);
  for (const record of fetched) byDate.set(record.date, record);

  return [...byDate.values()].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

/**
 * Records with start <= date <= end. Either bound may be left open.
 */
export function filterRange<T extends MarketRecord>(
  records: readonly T[],
  start?: IsoDate,
  end?: IsoDate
): T[] {
  return records.filter(
    (record) =>
      (start === undefined || record.date >= start) && (end === undefined || record.date <= end)
  );
}

/**
 * Payload whose bounds are the first and last date present, or null for
 * an empty set.
 */
export function toRangePayload<T extends MarketRecord>(records: T[]): RangePayload<T> | null {
  const first = records[0];
  const last = records[records.length - 1];
  if (!first || !last) {
    return null;
  }
  return { start_date: first.date, end_date: last.date, data: records };
}

/**
 * Answer a range request from the cached payload plus at most one store read.
 *
 * @example
 * ```typescript
 * const cached = await cache.get(key, isRangePayload);
 * const result = await mergeRange({ start: '2023-01-10' }, cached, store.priceRange(table, 'AAPL'));
 * if (result.payload && result.fetchedRange) {
 *   await cache.set(key, result.payload);
 * }
 * ```
 */
export async function mergeRange<T extends MarketRecord>(
  request: RangeRequest,
  cached: RangePayload<T> | null,
  source: RangeSource<T>
): Promise<RangeMergeResult<T>> {
  const missing = await resolveMissingBounds(request, cached, source);
  const fetchedRange = planFetch(missing, cached);
  const fetched = fetchedRange ? await source.fetchRange(fetchedRange.from, fetchedRange.to) : [];

  const merged = mergeRecords(cached?.data ?? [], fetched);

  return {
    payload: toRangePayload(merged),
    records: filterRange(merged, request.start, request.end),
    fetched: fetched.length,
    fetchedRange,
  };
}
