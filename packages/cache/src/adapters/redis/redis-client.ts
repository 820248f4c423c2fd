import { createClient, RESP_TYPES } from "redis"

export type RedisTtl = { EX: number } | { PX: number } | { EXAT: number }

/**
 * The slice of the node-redis client the cache adapter uses, with bulk
 * strings mapped to `Buffer` so values round-trip as bytes.
 */
export type RedisBytesClient = {
  readonly isOpen: boolean
  connect(): Promise<unknown>
  quit(): Promise<unknown>

  get(key: string): Promise<Buffer | null>
  mGet(keys: string[]): Promise<(Buffer | null)[]>
  set(key: string, value: Buffer, opts?: RedisTtl): Promise<unknown>
  del(keys: string | string[]): Promise<number>
}

export function createRedisBytesClient(url: string): RedisBytesClient {
  return createClient({ url }).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}
