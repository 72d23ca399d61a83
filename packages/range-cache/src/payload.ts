/**
 * Shape guards for values read back from the cache.
 *
 * Anything read from the key/value store is untrusted until one of these
 * accepts it.
 */

import { isIsoDate } from '@quotebook/contracts';
import type { MarketRecord, RangePayload } from '@quotebook/contracts';

export function isMarketRecord(value: unknown): value is MarketRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    'code' in value &&
    typeof value.code === 'string' &&
    'date' in value &&
    isIsoDate(value.date)
  );
}

export function isMarketRecordArray(value: unknown): value is MarketRecord[] {
  return Array.isArray(value) && value.every(isMarketRecord);
}

/**
 * Accepts `{start_date, end_date, data}` whose data is ordered by date and
 * whose bounds match the first and last record.
 */
export function isRangePayload(value: unknown): value is RangePayload {
  if (typeof value !== 'object' || value === null) return false;
  if (!('start_date' in value) || !('end_date' in value) || !('data' in value)) return false;

  const { start_date, end_date, data } = value;
  if (!isIsoDate(start_date) || !isIsoDate(end_date) || !isMarketRecordArray(data)) return false;

  const first = data[0];
  const last = data[data.length - 1];
  if (!first || !last) return false;
  if (first.date !== start_date || last.date !== end_date) return false;

  for (let i = 1; i < data.length; i++) {
    const previous = data[i - 1];
    const current = data[i];
    if (previous && current && previous.date >= current.date) return false;
  }

  return true;
}
