import { BaseError } from "@hearth/errors"
import type { DomainEvent } from "../ports/domain-event"

export type EventErrorCode = "event_publish_failed" | "event_malformed"

export class EventError extends BaseError<EventErrorCode> {
  static publishFailed(channel: string, event: DomainEvent, cause: unknown): EventError {
    return new EventError(`Publishing ${event.module}/${event.action} failed`, {
      code: "event_publish_failed",
      context: { channel, module: event.module, action: event.action },
      cause,
      isRetryable: true,
    })
  }

  static malformed(channel: string, details: string): EventError {
    return new EventError(`Dropped malformed message on "${channel}": ${details}`, {
      code: "event_malformed",
      context: { channel },
    })
  }
}
