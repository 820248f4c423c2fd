import { DeadlineError, type Milliseconds, withDeadline } from "@hearth/clock"
import type { Logger } from "@hearth/logger"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { DataCache } from "../../ports/data-cache"
import { CacheError, type CacheOperation } from "../cache-error"
import type { ReadThrough, ReadThroughOptions } from "../through/read-through"

export type SafeCallOptions = {
  /** Caller cancellation. An aborted call degrades the same way a timeout does. */
  signal?: AbortSignal
}

export type SafeSetOptions = SafeCallOptions & {
  /** Overrides the accessor's default TTL for this write. */
  ttl?: CacheTtl
}

/** Deletes keys without caring what type lives under them. */
export interface CacheInvalidator {
  invalidate(key: CacheKey, opts?: SafeCallOptions): Promise<void>
  invalidateMany(keys: readonly CacheKey[], opts?: SafeCallOptions): Promise<void>
}

export type SafeDataCacheDeps<T> = {
  cache: DataCache<T>
  logger: Logger
}

export type SafeDataCacheOptions = {
  /** Used by every `set` without its own TTL. `"none"` keeps entries until evicted. */
  defaultTtl: CacheTtl | "none"
  /** Upper bound for each call to the underlying store. */
  opTimeoutMs: Milliseconds
}

/**
 * Best-effort typed cache accessor.
 *
 * No method rejects because of the cache: store errors, timeouts, aborts and
 * undecodable entries become a miss (for reads) or a skipped write, and are
 * logged at `warn`. Corrupt entries are also deleted so the next read can
 * repopulate them.
 */
export class SafeDataCache<T> implements ReadThrough<T>, CacheInvalidator {
  constructor(
    private readonly deps: SafeDataCacheDeps<T>,
    private readonly opts: SafeDataCacheOptions,
  ) {}

  async get(key: CacheKey, opts: SafeCallOptions = {}): Promise<CacheResult<T>> {
    try {
      return await this.bounded(() => this.deps.cache.get(key), opts)
    } catch (err) {
      if (err instanceof CacheError && err.code === "cache_decode_failed") {
        this.deps.logger.warn("Discarding undecodable cache entry", { key, err })
        await this.invalidate(key, opts)
      } else {
        this.degraded("get", [key], err)
      }
      return { kind: "miss" }
    }
  }

  async set(key: CacheKey, value: T, opts: SafeSetOptions = {}): Promise<void> {
    const ttl = opts.ttl ?? this.opts.defaultTtl

    try {
      await this.bounded(
        () =>
          ttl === "none"
            ? this.deps.cache.set(key, value)
            : this.deps.cache.set(key, value, { ttl }),
        opts,
      )
    } catch (err) {
      this.degraded("set", [key], err)
    }
  }

  async invalidate(key: CacheKey, opts: SafeCallOptions = {}): Promise<void> {
    try {
      await this.bounded(() => this.deps.cache.invalidate(key), opts)
    } catch (err) {
      this.degraded("invalidate", [key], err)
    }
  }

  async invalidateMany(
    keys: readonly CacheKey[],
    opts: SafeCallOptions = {},
  ): Promise<void> {
    if (keys.length === 0) return

    try {
      await this.bounded(() => this.deps.cache.invalidateMany(keys), opts)
    } catch (err) {
      this.degraded("invalidate", keys, err)
    }
  }

  async getThrough(
    key: CacheKey,
    loader: () => Promise<T>,
    opts: ReadThroughOptions<T> = {},
  ): Promise<T> {
    const { shouldCache, ...setOpts } = opts
    const cached = await this.get(key, opts)

    if (cached.kind === "hit") return cached.value

    throwIfAborted(opts.signal)
    const value = await loader()
    throwIfAborted(opts.signal)

    if (shouldCache === undefined || shouldCache(value)) {
      await this.set(key, value, setOpts)
    }

    return value
  }

  private bounded<R>(op: () => Promise<R>, opts: SafeCallOptions): Promise<R> {
    return withDeadline(op, {
      timeoutMs: this.opts.opTimeoutMs,
      ...(opts.signal !== undefined && { signal: opts.signal }),
    })
  }

  private degraded(
    operation: CacheOperation,
    keys: readonly CacheKey[],
    cause: unknown,
  ): void {
    const err = CacheError.unavailable(operation, keys, cause)

    if (keys.length === 1 && keys[0] !== undefined) {
      this.deps.logger.warn(`Cache ${operation} failed; continuing without cache`, {
        key: keys[0],
        err,
      })
    } else {
      this.deps.logger.warn(`Cache ${operation} failed; continuing without cache`, {
        keys,
        err,
      })
    }
  }
}

/** A cancelled read-through gives up the fallback read and the write-back. */
function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw DeadlineError.aborted(signal.reason)
}
