import type { CacheEntry } from "./cache-entry"
import type { CacheKey } from "./cache-key"
import type { CacheSetOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"

/**
 * Cache for derived, non-authoritative data.
 *
 * Entries may be evicted at any time and may be stale. Implementations of this
 * port propagate store failures; wrap them in `SafeDataCache` where a failing
 * cache must not fail the caller.
 */
export interface DataCache<T> {
  /** A miss says nothing about the system of record. */
  get(key: CacheKey): Promise<CacheResult<T>>

  /** Overwrites. The store may still drop the entry before its TTL. */
  set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<void>

  /** Deleting an absent key is a no-op. */
  invalidate(key: CacheKey): Promise<void>

  getMany(keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<T>>>

  /** All entries share `opts`. */
  setMany(
    entries: readonly CacheEntry<T>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<void>

  invalidateMany(keys: readonly CacheKey[]): Promise<void>
}
