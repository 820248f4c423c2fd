import { createRedisBytesClient, type RedisBytesClient } from "@hearth/cache"
import {
  createRedisPubSubClient,
  type EventChannel,
  RedisEventChannel,
  type RedisPubSubClient,
} from "@hearth/events"
import type { AppConfig } from "../config"

export type InfraClients = {
  /** Backs the cache. */
  redisClient: RedisBytesClient
  /** Publishes domain events; subscriptions open their own duplicate. */
  pubsubClient: RedisPubSubClient
  eventChannel: EventChannel
}

/** Clients are created unconnected; the start hooks connect them. */
export function createInfraClients(
  config: AppConfig,
  overrides: Partial<InfraClients> = {},
): InfraClients {
  const redisClient = overrides.redisClient ?? createRedisBytesClient(config.redis.url)
  const pubsubClient = overrides.pubsubClient ?? createRedisPubSubClient(config.redis.url)
  const eventChannel = overrides.eventChannel ?? new RedisEventChannel(pubsubClient)

  return { redisClient, pubsubClient, eventChannel }
}
