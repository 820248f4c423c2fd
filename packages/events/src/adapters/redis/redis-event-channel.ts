import type {
  ChannelListener,
  EventChannel,
  Unsubscribe,
} from "../../ports/event-channel"
import type { RedisPubSubClient } from "./redis-pubsub-client"

/**
 * Redis `PUBLISH`/`SUBSCRIBE`. A connection in subscriber mode cannot publish,
 * so subscriptions go through a duplicate connection opened on first use.
 */
export class RedisEventChannel implements EventChannel {
  private subscriber: Promise<RedisPubSubClient> | undefined

  constructor(private readonly client: RedisPubSubClient) {}

  publish(channel: string, message: string): Promise<number> {
    return this.client.publish(channel, message)
  }

  async subscribe(channel: string, listener: ChannelListener): Promise<Unsubscribe> {
    const subscriber = await this.subscriberConnection()
    const onMessage = (message: string) => listener(message)

    await subscriber.subscribe(channel, onMessage)

    return async () => {
      await subscriber.unsubscribe(channel, onMessage)
    }
  }

  /**
   * Closes the subscriber connection, if one was opened. The publishing
   * client is the caller's.
   */
  async close(): Promise<void> {
    if (this.subscriber === undefined) return

    const subscriber = await this.subscriber
    this.subscriber = undefined
    if (subscriber.isOpen) await subscriber.quit()
  }

  private subscriberConnection(): Promise<RedisPubSubClient> {
    this.subscriber ??= this.openSubscriber()
    return this.subscriber
  }

  private async openSubscriber(): Promise<RedisPubSubClient> {
    const subscriber = this.client.duplicate()
    try {
      await subscriber.connect()
    } catch (err) {
      this.subscriber = undefined
      throw err
    }
    return subscriber
  }
}
