import type { BillCategoryRepository } from "./bill-categories/model/bill-category.repository"
import type { BillRepository } from "./bills/model/bill.repository"
import type { HomeRepository } from "./homes/model/home.repository"
import type { NotificationRepository } from "./notifications/model/notification.repository"
import type { PollRepository } from "./polls/model/poll.repository"
import type { RoomRepository } from "./rooms/model/room.repository"
import type { ShoppingRepository } from "./shopping/model/shopping.repository"
import type { TaskRepository } from "./tasks/model/task.repository"
import type { UserRepository } from "./users/model/user.repository"

/** The system of record, one port per entity family. */
export type HouseholdRepositories = {
  homes: HomeRepository
  tasks: TaskRepository
  bills: BillRepository
  billCategories: BillCategoryRepository
  polls: PollRepository
  rooms: RoomRepository
  shopping: ShoppingRepository
  notifications: NotificationRepository
  users: UserRepository
}
