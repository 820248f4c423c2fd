import type { BytesCache } from "../../ports/bytes-cache"
import type { CacheEntry } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheSetOptions, CacheTtl } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import type { RedisBytesClient, RedisTtl } from "./redis-client"

export type RedisBytesCacheOptions = {
  /** Most keys sent in one `MGET`/`DEL`, or values written per round of `SET`s. */
  batchSize: number
  keyspacePrefix: KeyspacePrefix
}

export class RedisBytesCache implements BytesCache {
  constructor(
    private readonly client: RedisBytesClient,
    private readonly opts: RedisBytesCacheOptions,
  ) {}

  async get(key: CacheKey): Promise<CacheResult<Uint8Array>> {
    return this.toResult(await this.client.get(this.fullKey(key)))
  }

  async set(
    key: CacheKey,
    value: Uint8Array,
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    await this.write(key, value, opts?.ttl)
  }

  async invalidate(key: CacheKey): Promise<void> {
    await this.client.del(this.fullKey(key))
  }

  async getMany(
    keys: readonly CacheKey[],
  ): Promise<Map<CacheKey, CacheResult<Uint8Array>>> {
    const out = new Map<CacheKey, CacheResult<Uint8Array>>()

    for (const batch of chunks(keys, this.opts.batchSize)) {
      const values = await this.client.mGet(batch.map((key) => this.fullKey(key)))

      batch.forEach((key, i) => out.set(key, this.toResult(values[i] ?? null)))
    }

    return out
  }

  async setMany(
    entries: readonly CacheEntry<Uint8Array>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    for (const batch of chunks(entries, this.opts.batchSize)) {
      await Promise.all(batch.map(([key, value]) => this.write(key, value, opts?.ttl)))
    }
  }

  async invalidateMany(keys: readonly CacheKey[]): Promise<void> {
    for (const batch of chunks(keys, this.opts.batchSize)) {
      await this.client.del(batch.map((key) => this.fullKey(key)))
    }
  }

  private async write(
    key: CacheKey,
    value: Uint8Array,
    ttl: CacheTtl | undefined,
  ): Promise<void> {
    const payload = Buffer.from(value)

    if (ttl === undefined) {
      await this.client.set(this.fullKey(key), payload)
    } else {
      await this.client.set(this.fullKey(key), payload, toRedisTtl(ttl))
    }
  }

  private toResult(buffer: Buffer | null): CacheResult<Uint8Array> {
    if (buffer === null) return { kind: "miss" }
    return { kind: "hit", value: new Uint8Array(buffer) }
  }

  private fullKey(key: CacheKey): string {
    return `${this.opts.keyspacePrefix}${key}`
  }
}

function* chunks<T>(items: readonly T[], size: number): Generator<T[]> {
  for (let i = 0; i < items.length; i += size) {
    yield items.slice(i, i + size)
  }
}

function toRedisTtl(ttl: CacheTtl): RedisTtl {
  switch (ttl.kind) {
    case "seconds":
      return { EX: ttl.seconds }
    case "milliseconds":
      return { PX: ttl.milliseconds }
    case "until":
      return { EXAT: Math.floor(ttl.expiresAt.getTime() / 1000) }
  }
}
