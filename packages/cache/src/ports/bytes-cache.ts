import type { DataCache } from "./data-cache"

/** Byte-level store implemented by adapters (memory, redis). */
export type BytesCache = DataCache<Uint8Array>
