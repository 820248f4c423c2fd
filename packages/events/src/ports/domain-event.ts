/** Subsystem an event belongs to. The values are part of the wire format. */
export const DomainModule = {
  BillCategory: "BILL_CATEGORY",
  Bill: "BILL",
  Home: "HOME",
  Notification: "NOTIFICATION",
  HomeNotification: "HOME_NOTIFICATION",
  Poll: "POLL",
  Room: "ROOM",
  ShoppingCategory: "SHOPPING_CATEGORY",
  ShoppingItem: "SHOPPING_ITEM",
  Task: "TASK",
  User: "USER",
} as const

export type DomainModule = (typeof DomainModule)[keyof typeof DomainModule]

/**
 * What happened. `MARKED_PAYED` keeps its historical spelling because
 * subscribers already match on it.
 */
export const DomainAction = {
  Created: "CREATED",
  Updated: "UPDATED",
  Deleted: "DELETED",
  MarkedPayed: "MARKED_PAYED",
  Closed: "CLOSED",
  Voted: "VOTED",
  Unvoted: "UNVOTED",
  MemberJoined: "MEMBER_JOINED",
  MemberLeft: "MEMBER_LEFT",
  MemberRemoved: "MEMBER_REMOVED",
  Assigned: "ASSIGNED",
  Completed: "COMPLETED",
  Uncompleted: "UNCOMPLETED",
  MarkRead: "MARK_READ",
} as const

export type DomainAction = (typeof DomainAction)[keyof typeof DomainAction]

/**
 * Broadcast after a successful mutation. `data` is either a snapshot of the
 * entity or a small identifier payload such as `{ id }`, and must survive
 * `JSON.stringify`.
 */
export type DomainEvent<TData = unknown> = Readonly<{
  module: DomainModule
  action: DomainAction
  data: TData
}>

export function domainEvent<TData>(
  module: DomainModule,
  action: DomainAction,
  data: TData,
): DomainEvent<TData> {
  return { module, action, data }
}
