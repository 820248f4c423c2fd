import { type Clock, type Milliseconds, SystemClock } from "@hearth/clock"
import { createEvictionMap } from "../../core/eviction/create-eviction-map"
import type { EvictionMap } from "../../core/eviction/eviction-map"
import type { BytesCache } from "../../ports/bytes-cache"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheEvictionPolicy } from "../../ports/cache-eviction-policy"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions, CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"

export type MemoryCacheOptions = {
  /** Inserting beyond this evicts according to the store's policy. */
  maxEntries: number
}

export type MemoryCacheEntry = {
  value: Uint8Array
  expiresAtMs?: Milliseconds
}

export type MemoryCacheDeps = {
  clock: Clock
  store: EvictionMap<CacheKey, MemoryCacheEntry>
}

/**
 * Process-local byte store. Expired entries are dropped lazily on read.
 * Values are copied on the way in and out so callers cannot mutate stored bytes.
 */
export class MemoryBytesCache implements BytesCache {
  constructor(
    private readonly deps: MemoryCacheDeps,
    private readonly opts: MemoryCacheOptions,
  ) {}

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    return this.read(key)
  }

  async set(
    key: CacheKey,
    value: Uint8Array,
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    this.ensureCapacityFor(this.deps.store.has(key) ? 0 : 1)
    this.write(key, value, opts?.ttl)
  }

  async invalidate(key: CacheKey): Promise<void> {
    this.deps.store.delete(key)
  }

  async getMany(
    keys: readonly CacheKey[],
  ): Promise<Map<CacheKey, CacheResult<Uint8Array>>> {
    return new Map(keys.map((key) => [key, this.read(key)]))
  }

  async setMany(
    entries: readonly CacheEntry<Uint8Array>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    const fresh = new Set(
      entries.map(([key]) => key).filter((key) => !this.deps.store.has(key)),
    )
    this.ensureCapacityFor(fresh.size)

    for (const [key, value] of entries) {
      this.write(key, value, opts?.ttl)
    }
  }

  async invalidateMany(keys: readonly CacheKey[]): Promise<void> {
    for (const key of keys) {
      this.deps.store.delete(key)
    }
  }

  private read(key: CacheKey): CacheResult<Uint8Array> {
    const entry = this.deps.store.get(key)
    if (entry === undefined) return { kind: "miss" }

    if (entry.expiresAtMs !== undefined && entry.expiresAtMs <= this.deps.clock.nowMs()) {
      this.deps.store.delete(key)
      return { kind: "miss" }
    }

    return { kind: "hit", value: new Uint8Array(entry.value) }
  }

  private write(key: CacheKey, value: Uint8Array, ttl: CacheTtl | undefined): void {
    this.deps.store.set(key, {
      value: new Uint8Array(value),
      ...(ttl !== undefined && { expiresAtMs: this.expiresAt(ttl) }),
    })
  }

  private expiresAt(ttl: CacheTtl): Milliseconds {
    switch (ttl.kind) {
      case "seconds":
        return this.deps.clock.nowMs() + ttl.seconds * 1000
      case "milliseconds":
        return this.deps.clock.nowMs() + ttl.milliseconds
      case "until":
        return ttl.expiresAt.getTime()
    }
  }

  private ensureCapacityFor(spaceNeeded: number): void {
    if (spaceNeeded <= 0) return
    if (spaceNeeded > this.opts.maxEntries) {
      throw new RangeError(
        `Cannot insert ${spaceNeeded} new entries with maxEntries=${this.opts.maxEntries}`,
      )
    }

    while (this.deps.store.size() + spaceNeeded > this.opts.maxEntries) {
      const victim = this.deps.store.victim()
      if (victim === undefined) {
        throw new Error(
          "Invariant violation: eviction map is over capacity but has no victim",
        )
      }
      this.deps.store.delete(victim)
    }
  }
}

export type CreateMemoryBytesCacheOptions = MemoryCacheOptions & {
  /** @default "lru" */
  evictionPolicy?: CacheEvictionPolicy
  clock?: Clock
}

export function createMemoryBytesCache(
  opts: CreateMemoryBytesCacheOptions,
): MemoryBytesCache {
  return new MemoryBytesCache(
    {
      clock: opts.clock ?? new SystemClock(),
      store: createEvictionMap(opts.evictionPolicy ?? "lru"),
    },
    { maxEntries: opts.maxEntries },
  )
}
