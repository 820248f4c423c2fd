export type { BytesCache } from "./ports/bytes-cache"
export type { CacheEntry } from "./ports/cache-entry"
export type { CacheEvictionPolicy } from "./ports/cache-eviction-policy"
export type { CacheKey } from "./ports/cache-key"
export { Ttl, type CacheSetOptions, type CacheTtl } from "./ports/cache-options"
export type { CacheHit, CacheMiss, CacheResult } from "./ports/cache-result"
export type { Codec } from "./ports/codec"
export type { DataCache } from "./ports/data-cache"
export type { KeyspacePrefix } from "./ports/keyspace-prefix"

export { CacheError, type CacheErrorCode, type CacheOperation } from "./core/cache-error"
export { createJsonCodec } from "./core/codec/json-codec"
export { CodecDataCache } from "./core/codec-data-cache"
export { createEvictionMap } from "./core/eviction/create-eviction-map"
export type { EvictionMap } from "./core/eviction/eviction-map"
export { FifoMemoryMap } from "./core/eviction/fifo-memory-map"
export { LruMemoryMap } from "./core/eviction/lru-memory-map"
export {
  SafeDataCache,
  type CacheInvalidator,
  type SafeCallOptions,
  type SafeDataCacheDeps,
  type SafeDataCacheOptions,
  type SafeSetOptions,
} from "./core/safe/safe-data-cache"
export type { ReadThrough, ReadThroughOptions } from "./core/through/read-through"

export {
  createMemoryBytesCache,
  MemoryBytesCache,
  type CreateMemoryBytesCacheOptions,
  type MemoryCacheDeps,
  type MemoryCacheEntry,
  type MemoryCacheOptions,
} from "./adapters/memory/memory-bytes-cache"
export {
  RedisBytesCache,
  type RedisBytesCacheOptions,
} from "./adapters/redis/redis-bytes-cache"
export {
  createRedisBytesClient,
  type RedisBytesClient,
  type RedisTtl,
} from "./adapters/redis/redis-client"
