import type { DomainEvent } from "./domain-event"

export type PublishOptions = {
  signal?: AbortSignal
}

/**
 * Broadcasts domain events to whoever listens.
 *
 * `publish` never rejects: an unreachable bus or a timeout is logged and the
 * event is dropped. Callers treat it as best effort.
 */
export interface EventPublisher {
  publish(event: DomainEvent, opts?: PublishOptions): Promise<void>
}
