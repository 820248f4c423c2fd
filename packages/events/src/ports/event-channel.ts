export type ChannelListener = (message: string) => void

export type Unsubscribe = () => Promise<void>

/** Fire-and-forget pub/sub transport. Delivery is at most once. */
export interface EventChannel {
  /** Resolves with the number of subscribers that received the message, when known. */
  publish(channel: string, message: string): Promise<number>
  subscribe(channel: string, listener: ChannelListener): Promise<Unsubscribe>
}
