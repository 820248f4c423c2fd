import type { CacheEvictionPolicy } from "@hearth/cache"
import type { Milliseconds, Seconds } from "@hearth/clock"
import { type LogLevelName, logLevelNames } from "@hearth/logger"
import { z } from "zod"

/** Real booleans from overrides, "true"/"false"/"1"/"0" from the environment. */
const flag = z.union([z.boolean(), z.stringbool()])

const positiveInt = z.coerce.number().int().positive()

export const envSchema = z.object({
  APP_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("hearth-household"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: flag.default(false),

  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_KEY_PREFIX: z.string().default("hearth"),

  CACHE_DRIVER: z.enum(["redis", "memory"]).default("redis"),
  CACHE_TTL_SECONDS: positiveInt.default(3600),
  CACHE_OP_TIMEOUT_MS: positiveInt.default(250),
  CACHE_BATCH_SIZE: positiveInt.default(500),
  CACHE_MEMORY_MAX_ENTRIES: positiveInt.default(10_000),
  CACHE_MEMORY_EVICTION: z.enum(["lru", "fifo"]).default("lru"),

  EVENTS_CHANNEL: z.string().min(1).default("updates"),
  EVENTS_PUBLISH_TIMEOUT_MS: positiveInt.default(250),
})

export type EnvConfig = z.infer<typeof envSchema>

/** Raw values accepted as overrides, keyed like the environment. */
export type EnvOverrides = Partial<z.input<typeof envSchema>>

export type CacheDriver = EnvConfig["CACHE_DRIVER"]

export type AppConfig = {
  app: {
    env: string
    serviceName: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
  }

  redis: {
    url: string
    keyPrefix: string
  }

  cache: {
    /** `memory` keeps entries in this process; instances share nothing. */
    driver: CacheDriver
    ttlSeconds: Seconds
    opTimeoutMs: Milliseconds
    batchSize: number
    memory: {
      maxEntries: number
      evictionPolicy: CacheEvictionPolicy
    }
  }

  events: {
    channel: string
    publishTimeoutMs: Milliseconds
  }
}
