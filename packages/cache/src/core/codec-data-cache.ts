import type { BytesCache } from "../ports/bytes-cache"
import type { CacheEntry } from "../ports/cache-entry"
import type { CacheKey } from "../ports/cache-key"
import type { CacheSetOptions } from "../ports/cache-options"
import type { CacheResult } from "../ports/cache-result"
import type { Codec } from "../ports/codec"
import type { DataCache } from "../ports/data-cache"
import { CacheError } from "./cache-error"

/**
 * Typed view over a byte store. Undecodable entries reject with
 * `cache_decode_failed`.
 */
export class CodecDataCache<T> implements DataCache<T> {
  constructor(
    private readonly bytesCache: BytesCache,
    private readonly codec: Codec<T>,
  ) {}

  async get(key: CacheKey): Promise<CacheResult<T>> {
    return this.decodeResult(key, await this.bytesCache.get(key))
  }

  async set(key: CacheKey, value: T, opts?: Partial<CacheSetOptions>): Promise<void> {
    await this.bytesCache.set(key, this.codec.encode(value), opts)
  }

  async invalidate(key: CacheKey): Promise<void> {
    await this.bytesCache.invalidate(key)
  }

  async getMany(keys: readonly CacheKey[]): Promise<Map<CacheKey, CacheResult<T>>> {
    const raw = await this.bytesCache.getMany(keys)
    const out = new Map<CacheKey, CacheResult<T>>()

    for (const [key, res] of raw) {
      out.set(key, this.decodeResult(key, res))
    }

    return out
  }

  async setMany(
    entries: readonly CacheEntry<T>[],
    opts?: Partial<CacheSetOptions>,
  ): Promise<void> {
    const encoded = entries.map(
      ([key, value]): CacheEntry<Uint8Array> => [key, this.codec.encode(value)],
    )
    await this.bytesCache.setMany(encoded, opts)
  }

  async invalidateMany(keys: readonly CacheKey[]): Promise<void> {
    await this.bytesCache.invalidateMany(keys)
  }

  private decodeResult(key: CacheKey, res: CacheResult<Uint8Array>): CacheResult<T> {
    if (res.kind === "miss") return res

    try {
      return { kind: "hit", value: this.codec.decode(res.value) }
    } catch (err) {
      throw CacheError.decodeFailed(key, err)
    }
  }
}
