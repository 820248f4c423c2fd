/**
 * Opaque to adapters. Build keys through the application's key scheme, never
 * by interpolating at call sites.
 */
export type CacheKey = string
