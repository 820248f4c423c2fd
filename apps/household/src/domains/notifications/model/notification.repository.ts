import type {
  HomeNotification,
  NewHomeNotification,
  NewNotification,
  Notification,
} from "./notification.model"

export interface NotificationRepository {
  createForUser(input: NewNotification): Promise<Notification>
  listForUser(userId: number): Promise<Notification[]>
  /** Only marks notifications addressed to `userId`. */
  markRead(id: number, userId: number): Promise<void>

  createForHome(input: NewHomeNotification): Promise<HomeNotification>
  listForHome(homeId: number): Promise<HomeNotification[]>
  markHomeRead(id: number, homeId: number): Promise<void>
}
