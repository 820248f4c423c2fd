import type { AppContext } from "../create-context"
import type { LifecycleHook } from "./lifecycle-hook"

/** The cache client is only connected when Redis backs the cache. */
export function createStartHooks(context: AppContext): LifecycleHook[] {
  const cacheHooks: LifecycleHook[] =
    context.config.cache.driver === "redis"
      ? [
          {
            name: "start:redis:cache",
            fn: async () => {
              const { redisClient } = context.infra
              if (!redisClient.isOpen) await redisClient.connect()
            },
          },
        ]
      : []

  return [
    ...cacheHooks,
    {
      name: "start:redis:events",
      fn: async () => {
        if (!context.infra.pubsubClient.isOpen) await context.infra.pubsubClient.connect()
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
