/**
 * @quotebook/range-cache
 *
 * Cache-aside gateway, key/value stores and incremental range merge
 */

export {
  buildCacheKey,
  pricesKey,
  priceRequestKey,
  CACHE_KEY_PREFIX,
  CACHE_KEY_DELIMITER,
  ABSENT_PART,
  type CacheScope,
} from './keys.js';

export { MemoryKeyValueStore, type KeyValueStore } from './kv-store.js';
export { RedisKeyValueStore, type RedisStoreOptions } from './redis-store.js';

export {
  CacheGateway,
  CACHE_TTL_SECONDS,
  type CacheGatewayOptions,
  type CacheLogger,
  type CacheValidator,
} from './gateway.js';

export { isMarketRecord, isMarketRecordArray, isRangePayload } from './payload.js';

export {
  mergeRange,
  resolveMissingBounds,
  planFetch,
  mergeRecords,
  filterRange,
  toRangePayload,
  type RangeSource,
  type RangeRequest,
  type MissingBounds,
  type FetchRange,
  type RangeMergeResult,
} from './merge.js';

export { SingleFlight } from './single-flight.js';
