import { BaseError } from "@hearth/errors"
import type { CacheKey } from "../ports/cache-key"

export type CacheErrorCode = "cache_unavailable" | "cache_decode_failed"

export type CacheOperation = "get" | "set" | "invalidate"

/**
 * Describes a degraded cache call. `SafeDataCache` logs these and carries on;
 * they are never thrown past it.
 */
export class CacheError extends BaseError<CacheErrorCode> {
  static unavailable(
    operation: CacheOperation,
    keys: readonly CacheKey[],
    cause: unknown,
  ): CacheError {
    return new CacheError(`Cache ${operation} failed`, {
      code: "cache_unavailable",
      context: { operation, keys },
      cause,
      isRetryable: true,
    })
  }

  static decodeFailed(key: CacheKey, cause: unknown): CacheError {
    return new CacheError(`Cached value at "${key}" could not be decoded`, {
      code: "cache_decode_failed",
      context: { key },
      cause,
    })
  }
}
