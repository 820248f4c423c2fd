import { createNullLogger, type Logger } from "@hearth/logger"
import type {
  ChannelListener,
  EventChannel,
  Unsubscribe,
} from "../../ports/event-channel"

export type MemoryEventChannelDeps = {
  logger?: Logger
}

/**
 * In-process pub/sub for a single process and for tests. Listeners run
 * synchronously inside `publish`, in subscription order; a throwing listener
 * is logged and does not stop the others.
 *
 * Every published message is kept in `published` until `clear()`.
 */
export class MemoryEventChannel implements EventChannel {
  private readonly listeners = new Map<string, Set<ChannelListener>>()
  private readonly logger: Logger
  readonly published: { channel: string; message: string }[] = []

  constructor(deps: MemoryEventChannelDeps = {}) {
    this.logger = deps.logger ?? createNullLogger()
  }

  async publish(channel: string, message: string): Promise<number> {
    this.published.push({ channel, message })

    const listeners = [...(this.listeners.get(channel) ?? [])]
    for (const listener of listeners) {
      try {
        listener(message)
      } catch (err) {
        this.logger.warn("Event listener failed", { channel, err })
      }
    }

    return listeners.length
  }

  async subscribe(channel: string, listener: ChannelListener): Promise<Unsubscribe> {
    const set = this.listeners.get(channel) ?? new Set<ChannelListener>()
    set.add(listener)
    this.listeners.set(channel, set)

    return async () => {
      set.delete(listener)
      if (set.size === 0) this.listeners.delete(channel)
    }
  }

  subscriberCount(channel: string): number {
    return this.listeners.get(channel)?.size ?? 0
  }

  clear(): void {
    this.published.length = 0
  }
}
