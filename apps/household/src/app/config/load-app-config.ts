import {
  type ConfigSource,
  DotenvSource,
  EnvSource,
  loadConfig,
  ObjectSource,
} from "@hearth/config"
import { type AppConfig, type EnvConfig, type EnvOverrides, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
      serviceName: env.SERVICE_NAME,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    redis: {
      url: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
    },
    cache: {
      driver: env.CACHE_DRIVER,
      ttlSeconds: env.CACHE_TTL_SECONDS,
      opTimeoutMs: env.CACHE_OP_TIMEOUT_MS,
      batchSize: env.CACHE_BATCH_SIZE,
      memory: {
        maxEntries: env.CACHE_MEMORY_MAX_ENTRIES,
        evictionPolicy: env.CACHE_MEMORY_EVICTION,
      },
    },
    events: {
      channel: env.EVENTS_CHANNEL,
      publishTimeoutMs: env.EVENTS_PUBLISH_TIMEOUT_MS,
    },
  }
}

/**
 * Sources, later wins: `.env.<NODE_ENV>` under `cwd` if present, then `env`,
 * then `overrides`.
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides?: EnvOverrides,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const nodeEnv = env["NODE_ENV"] ?? "development"

  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${nodeEnv}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  if (overrides !== undefined) sources.push(new ObjectSource(overrides))

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
