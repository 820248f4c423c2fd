import { createClient } from "redis"

/** The node-redis calls the event channel needs. */
export type RedisPubSubClient = {
  readonly isOpen: boolean
  connect(): Promise<unknown>
  quit(): Promise<unknown>
  duplicate(): RedisPubSubClient

  publish(channel: string, message: string): Promise<number>
  subscribe(
    channel: string,
    listener: (message: string, channel: string) => void,
  ): Promise<unknown>
  unsubscribe(
    channel: string,
    listener: (message: string, channel: string) => void,
  ): Promise<unknown>
}

export function createRedisPubSubClient(url: string): RedisPubSubClient {
  return createClient({ url }) as unknown as RedisPubSubClient
}
