/**
 * Cache key scheme.
 *
 * Format: `{prefix}:{scope}:{part}:{part}...`
 * Example: `quotebook:prices:AAPL:2023-01-01:_`
 */

export const CACHE_KEY_PREFIX = 'quotebook';

export const CACHE_KEY_DELIMITER = ':';

/**
 * Placeholder for an absent part, so `(AAPL, none, 2023-01-31)` and
 * `(AAPL, 2023-01-31, none)` never collide.
 */
export const ABSENT_PART = '_';

export type CacheScope = 'prices' | 'latest' | 'signals' | 'tables';

/**
 * Build a deterministic cache key. Parts keep their position; null and
 * undefined render as {@link ABSENT_PART}. Present parts are URI-encoded, so
 * a delimiter inside a part cannot shift the parts after it.
 *
 * @example
 * ```typescript
 * buildCacheKey('prices', 'AAPL', '2023-01-01', undefined); // 'quotebook:prices:AAPL:2023-01-01:_'
 * buildCacheKey('latest', 'krx', '2024-03-15');             // 'quotebook:latest:krx:2024-03-15'
 * ```
 */
export function buildCacheKey(
  scope: CacheScope,
  ...parts: ReadonlyArray<string | number | null | undefined>
): string {
  const rendered = parts.map((part) =>
    part === null || part === undefined || part === '' ? ABSENT_PART : encodePart(String(part))
  );
  return [CACHE_KEY_PREFIX, scope, ...rendered].join(CACHE_KEY_DELIMITER);
}

function encodePart(part: string): string {
  const encoded = encodeURIComponent(part);
  // a literal "_" must not read as an absent part
  return encoded === ABSENT_PART ? '%5F' : encoded;
}

/**
 * Key of a ticker's cached price range. One payload per ticker: every request
 * for the ticker reads it and widens it, whatever bounds it asks for.
 */
export function pricesKey(ticker: string): string {
  return buildCacheKey('prices', ticker);
}

/**
 * Identity of one price request, bounds included. Used to coalesce
 * identical concurrent requests, never as a storage key.
 */
export function priceRequestKey(ticker: string, start?: string | null, end?: string | null): string {
  return buildCacheKey('prices', ticker, start, end);
}
