import type { CacheKey } from "../../ports/cache-key"
import type { CacheTtl } from "../../ports/cache-options"

export type ReadThroughOptions<T> = {
  ttl?: CacheTtl
  signal?: AbortSignal
  /** Return `false` to hand the value back without caching it (empty lists, `null`). */
  shouldCache?: (value: T) => boolean
}

/**
 * Cache-aside read: serve from cache, else call `loader` and store its result.
 * Loader errors propagate; cache errors are the implementation's business.
 */
export interface ReadThrough<T> {
  getThrough(
    key: CacheKey,
    loader: () => Promise<T>,
    opts?: ReadThroughOptions<T>,
  ): Promise<T>
}
