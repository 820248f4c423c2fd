import type { Logger } from "@hearth/logger"
import { z } from "zod"
import { DomainAction, type DomainEvent, DomainModule } from "../ports/domain-event"
import type { EventChannel, Unsubscribe } from "../ports/event-channel"
import { EventError } from "./event-error"

export const domainEventSchema = z.object({
  module: z.enum(DomainModule),
  action: z.enum(DomainAction),
  data: z.unknown(),
})

export type ParsedDomainEvent =
  | { ok: true; event: DomainEvent }
  | { ok: false; error: string }

/** Validate one raw channel message. */
export function parseDomainEvent(message: string): ParsedDomainEvent {
  let json: unknown
  try {
    json = JSON.parse(message)
  } catch {
    return { ok: false, error: "payload is not JSON" }
  }

  const result = domainEventSchema.safeParse(json)
  if (!result.success) return { ok: false, error: z.prettifyError(result.error) }

  const { module, action, data } = result.data
  return { ok: true, event: { module, action, data } }
}

/**
 * Deliver validated events from `channelName` to `handler`. Malformed
 * messages are logged and skipped; handler errors are logged too, so one bad
 * subscriber cannot stop the stream.
 */
export function subscribeToDomainEvents(
  channel: EventChannel,
  channelName: string,
  handler: (event: DomainEvent) => void | Promise<void>,
  logger: Logger,
): Promise<Unsubscribe> {
  return channel.subscribe(channelName, (message) => {
    const parsed = parseDomainEvent(message)

    if (!parsed.ok) {
      logger.warn("Ignoring malformed domain event", {
        channel: channelName,
        err: EventError.malformed(channelName, parsed.error),
      })
      return
    }

    void Promise.resolve()
      .then(() => handler(parsed.event))
      .catch((err: unknown) => {
        logger.error("Domain event handler failed", { channel: channelName, err })
      })
  })
}
