import type { SafeDataCache } from "@hearth/cache"
import { DomainAction, DomainModule, domainEvent } from "@hearth/events"
import { HouseholdKeys } from "../../../keyspace"
import type { CallOptions, DomainServiceDeps } from "../../../lib/service-deps"
import type {
  HomeNotification,
  NewHomeNotification,
  NewNotification,
  Notification,
} from "../model/notification.model"
import type { NotificationRepository } from "../model/notification.repository"

export class NotificationService {
  private readonly userCache: SafeDataCache<Notification[]>
  private readonly homeCache: SafeDataCache<HomeNotification[]>

  constructor(private readonly deps: DomainServiceDeps<NotificationRepository>) {
    this.userCache = deps.cache<Notification[]>()
    this.homeCache = deps.cache<HomeNotification[]>()
  }

  notifyUser(input: NewNotification, opts: CallOptions = {}): Promise<Notification> {
    return this.deps.coordinator.mutate(
      {
        name: "notifyUser",
        invalidate: () => [HouseholdKeys.userNotifications(input.to)],
        write: () => this.deps.repository.createForUser(input),
        event: (notification) =>
          domainEvent(DomainModule.Notification, DomainAction.Created, notification),
      },
      opts,
    )
  }

  getForUser(userId: number, opts: CallOptions = {}): Promise<Notification[]> {
    return this.deps.coordinator.read(
      this.userCache,
      HouseholdKeys.userNotifications(userId),
      () => this.deps.repository.listForUser(userId),
      opts,
    )
  }

  markRead(id: number, userId: number, opts: CallOptions = {}): Promise<void> {
    return this.deps.coordinator.mutate(
      {
        name: "markNotificationRead",
        invalidate: () => [HouseholdKeys.userNotifications(userId)],
        write: () => this.deps.repository.markRead(id, userId),
        event: () =>
          domainEvent(DomainModule.Notification, DomainAction.MarkRead, { id }),
      },
      opts,
    )
  }

  notifyHome(
    input: NewHomeNotification,
    opts: CallOptions = {},
  ): Promise<HomeNotification> {
    return this.deps.coordinator.mutate(
      {
        name: "notifyHome",
        invalidate: () => [HouseholdKeys.homeNotifications(input.homeId)],
        write: () => this.deps.repository.createForHome(input),
        event: (notification) =>
          domainEvent(DomainModule.HomeNotification, DomainAction.Created, notification),
      },
      opts,
    )
  }

  getForHome(homeId: number, opts: CallOptions = {}): Promise<HomeNotification[]> {
    return this.deps.coordinator.read(
      this.homeCache,
      HouseholdKeys.homeNotifications(homeId),
      () => this.deps.repository.listForHome(homeId),
      opts,
    )
  }

  markHomeNotificationRead(
    id: number,
    homeId: number,
    opts: CallOptions = {},
  ): Promise<void> {
    return this.deps.coordinator.mutate(
      {
        name: "markHomeNotificationRead",
        invalidate: () => [HouseholdKeys.homeNotifications(homeId)],
        write: () => this.deps.repository.markHomeRead(id, homeId),
        event: () =>
          domainEvent(DomainModule.HomeNotification, DomainAction.MarkRead, { id }),
      },
      opts,
    )
  }
}
