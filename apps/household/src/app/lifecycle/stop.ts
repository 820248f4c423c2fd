import { RedisEventChannel } from "@hearth/events"
import type { AppContext } from "../create-context"
import type { LifecycleHook } from "./lifecycle-hook"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  return [
    {
      name: "stop:events:subscriber",
      fn: async () => {
        const { eventChannel } = context.infra
        if (eventChannel instanceof RedisEventChannel) await eventChannel.close()
      },
    },
    {
      name: "stop:redis:events",
      fn: async () => {
        if (context.infra.pubsubClient.isOpen) await context.infra.pubsubClient.quit()
      },
    },
    {
      name: "stop:redis:cache",
      fn: async () => {
        if (context.infra.redisClient.isOpen) await context.infra.redisClient.quit()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
