/**
 * Map-like storage that also decides which key to drop when an in-memory cache
 * is full. `get` and `set` may reorder entries as a side effect.
 */
export interface EvictionMap<K, V> {
  get(key: K): V | undefined
  set(key: K, value: V): void
  /** `true` when the key was present. */
  delete(key: K): boolean
  has(key: K): boolean
  size(): number
  /** Next key to evict, or `undefined` when empty. */
  victim(): K | undefined
}
