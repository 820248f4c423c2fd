import type { CacheKey } from "@hearth/cache"

/** Entity families with their own cache entries. Never contains `:`. */
export type CacheKind =
  | "home"
  | "task"
  | "tasks"
  | "assignment"
  | "assignments"
  | "bill"
  | "bills"
  | "bill-categories"
  | "poll"
  | "polls"
  | "room"
  | "rooms"
  | "shopping-category"
  | "shopping-categories"
  | "notifications"

/** Qualifies a kind: the parent a list hangs off, or a derived index. */
export type CacheRelation = "home" | "user" | "closest"

/**
 * `kind:id`, or `kind:relation:id` for lists and derived entries.
 *
 * Kinds and relations are fixed words without the separator and ids are
 * decimal digits, so distinct inputs always give distinct keys.
 *
 * @throws RangeError when `id` is not a non-negative safe integer.
 */
export function cacheKey(
  kind: CacheKind,
  id: number,
  relation?: CacheRelation,
): CacheKey {
  if (!Number.isSafeInteger(id) || id < 0) {
    throw new RangeError(`Cache key id must be a non-negative integer, got ${id}`)
  }

  return relation === undefined ? `${kind}:${id}` : `${kind}:${relation}:${id}`
}

export const HouseholdKeys = {
  home: (id: number) => cacheKey("home", id),

  task: (id: number) => cacheKey("task", id),
  tasksForHome: (homeId: number) => cacheKey("tasks", homeId, "home"),
  assignment: (id: number) => cacheKey("assignment", id),
  assignmentsForUser: (userId: number) => cacheKey("assignments", userId, "user"),
  closestAssignmentForUser: (userId: number) => cacheKey("assignment", userId, "closest"),

  bill: (id: number) => cacheKey("bill", id),
  billsForHome: (homeId: number) => cacheKey("bills", homeId, "home"),
  billCategoriesForHome: (homeId: number) => cacheKey("bill-categories", homeId, "home"),

  poll: (id: number) => cacheKey("poll", id),
  pollsForHome: (homeId: number) => cacheKey("polls", homeId, "home"),

  room: (id: number) => cacheKey("room", id),
  roomsForHome: (homeId: number) => cacheKey("rooms", homeId, "home"),

  shoppingCategory: (id: number) => cacheKey("shopping-category", id),
  shoppingCategoriesForHome: (homeId: number) =>
    cacheKey("shopping-categories", homeId, "home"),

  userNotifications: (userId: number) => cacheKey("notifications", userId, "user"),
  homeNotifications: (homeId: number) => cacheKey("notifications", homeId, "home"),
} as const

/** Every list key scoped to one home. */
export function homeScopedKeys(homeId: number): CacheKey[] {
  return [
    HouseholdKeys.tasksForHome(homeId),
    HouseholdKeys.billsForHome(homeId),
    HouseholdKeys.billCategoriesForHome(homeId),
    HouseholdKeys.pollsForHome(homeId),
    HouseholdKeys.roomsForHome(homeId),
    HouseholdKeys.shoppingCategoriesForHome(homeId),
    HouseholdKeys.homeNotifications(homeId),
  ]
}
