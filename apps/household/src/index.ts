export { type AppConfig, type EnvOverrides, loadAppConfig } from "./app/config"
export {
  type AppContext,
  type AppContextOptions,
  createAppContext,
} from "./app/create-context"
export type {
  HookFailure,
  LifecycleHook,
  LifecycleHookContext,
} from "./app/lifecycle/lifecycle-hook"
export {
  type HookPhase,
  type RunHooksContext,
  type RunHooksResult,
  runHooks,
} from "./app/lifecycle/run-hooks"
export type { CoreServices } from "./app/services/core"
export type { DomainModuleName, DomainServices } from "./app/services/domains"
export type { InfraClients } from "./app/services/infra"

export {
  type CacheKind,
  type CacheRelation,
  cacheKey,
  HouseholdKeys,
  homeScopedKeys,
} from "./keyspace"
export type { CallOptions } from "./lib/service-deps"

export { HouseholdError, type HouseholdErrorCode } from "./domains/household.errors"
export type { HouseholdRepositories } from "./domains/repositories"

export type {
  BillCategory,
  BillCategoryPatch,
  NewBillCategory,
} from "./domains/bill-categories/model/bill-category.model"
export type { BillCategoryRepository } from "./domains/bill-categories/model/bill-category.repository"
export { BillCategoryService } from "./domains/bill-categories/services/bill-category.service"

export type { Bill, NewBill } from "./domains/bills/model/bill.model"
export type { BillRepository } from "./domains/bills/model/bill.repository"
export { BillService } from "./domains/bills/services/bill.service"

export type {
  Home,
  HomeMember,
  MemberRole,
  NewHome,
} from "./domains/homes/model/home.model"
export type { HomeRepository } from "./domains/homes/model/home.repository"
export { HomeService, type Membership } from "./domains/homes/services/home.service"

export type {
  HomeNotification,
  NewHomeNotification,
  NewNotification,
  Notification,
} from "./domains/notifications/model/notification.model"
export type { NotificationRepository } from "./domains/notifications/model/notification.repository"
export { NotificationService } from "./domains/notifications/services/notification.service"

export type {
  NewPoll,
  Poll,
  PollOption,
  PollStatus,
  PollType,
  Vote,
} from "./domains/polls/model/poll.model"
export type { PollRepository } from "./domains/polls/model/poll.repository"
export { PollService } from "./domains/polls/services/poll.service"

export type { Room } from "./domains/rooms/model/room.model"
export type { RoomRepository } from "./domains/rooms/model/room.repository"
export { RoomService } from "./domains/rooms/services/room.service"

export type {
  NewShoppingCategory,
  NewShoppingItem,
  ShoppingCategory,
  ShoppingCategoryPatch,
  ShoppingItem,
  ShoppingItemPatch,
} from "./domains/shopping/model/shopping.model"
export type { ShoppingRepository } from "./domains/shopping/model/shopping.repository"
export { ShoppingService } from "./domains/shopping/services/shopping.service"

export type {
  AssignmentStatus,
  NewAssignment,
  NewTask,
  ScheduleType,
  Task,
  TaskAssignment,
} from "./domains/tasks/model/task.model"
export type { TaskRepository } from "./domains/tasks/model/task.repository"
export { TaskService } from "./domains/tasks/services/task.service"

export type { User } from "./domains/users/model/user.model"
export type { UserRepository } from "./domains/users/model/user.repository"
export { UserService } from "./domains/users/services/user.service"
