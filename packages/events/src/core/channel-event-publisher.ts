import { type Milliseconds, withDeadline } from "@hearth/clock"
import type { Logger } from "@hearth/logger"
import type { DomainEvent } from "../ports/domain-event"
import type { EventChannel } from "../ports/event-channel"
import type { EventPublisher, PublishOptions } from "../ports/event-publisher"
import { EventError } from "./event-error"

export const DEFAULT_EVENTS_CHANNEL = "updates"

export type ChannelEventPublisherDeps = {
  channel: EventChannel
  logger: Logger
}

export type ChannelEventPublisherOptions = {
  /** @default "updates" */
  channelName?: string
  publishTimeoutMs: Milliseconds
}

/** Serializes each event as `{module, action, data}` JSON onto one channel. */
export class ChannelEventPublisher implements EventPublisher {
  private readonly channelName: string

  constructor(
    private readonly deps: ChannelEventPublisherDeps,
    private readonly opts: ChannelEventPublisherOptions,
  ) {
    this.channelName = opts.channelName ?? DEFAULT_EVENTS_CHANNEL
  }

  async publish(event: DomainEvent, opts: PublishOptions = {}): Promise<void> {
    try {
      const payload = JSON.stringify({
        module: event.module,
        action: event.action,
        data: event.data,
      })

      await withDeadline(() => this.deps.channel.publish(this.channelName, payload), {
        timeoutMs: this.opts.publishTimeoutMs,
        ...(opts.signal !== undefined && { signal: opts.signal }),
      })
    } catch (err) {
      this.deps.logger.warn("Domain event dropped", {
        channel: this.channelName,
        err: EventError.publishFailed(this.channelName, event, err),
      })
    }
  }
}
