import type { CacheKey } from "./cache-key"

export type CacheEntry<T> = readonly [CacheKey, T]
