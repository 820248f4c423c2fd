export {
  DomainAction,
  DomainModule,
  domainEvent,
  type DomainEvent,
} from "./ports/domain-event"
export type { ChannelListener, EventChannel, Unsubscribe } from "./ports/event-channel"
export type { EventPublisher, PublishOptions } from "./ports/event-publisher"

export {
  ChannelEventPublisher,
  DEFAULT_EVENTS_CHANNEL,
  type ChannelEventPublisherDeps,
  type ChannelEventPublisherOptions,
} from "./core/channel-event-publisher"
export {
  domainEventSchema,
  parseDomainEvent,
  subscribeToDomainEvents,
  type ParsedDomainEvent,
} from "./core/domain-event-schema"
export { EventError, type EventErrorCode } from "./core/event-error"

export { MemoryEventChannel } from "./adapters/memory/memory-event-channel"
export { RedisEventChannel } from "./adapters/redis/redis-event-channel"
export {
  createRedisPubSubClient,
  type RedisPubSubClient,
} from "./adapters/redis/redis-pubsub-client"
