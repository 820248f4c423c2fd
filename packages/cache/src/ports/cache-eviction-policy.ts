/** `lru` evicts the least recently read entry; `fifo` the oldest write. */
export type CacheEvictionPolicy = "lru" | "fifo"
