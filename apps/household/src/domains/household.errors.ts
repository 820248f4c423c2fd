import { BaseError } from "@hearth/errors"

export type HouseholdErrorCode =
  | "home_not_found"
  | "invalid_invite_code"
  | "already_member"
  | "cannot_remove_self"
  | "task_not_found"
  | "assignment_not_found"
  | "bill_not_found"
  | "bill_already_paid"
  | "bill_category_not_found"
  | "poll_not_found"
  | "poll_closed"
  | "poll_already_closed"
  | "revote_not_allowed"
  | "room_not_found"
  | "shopping_category_not_found"
  | "category_not_in_home"
  | "shopping_item_not_found"
  | "user_not_found"

type NotFoundCode = Extract<HouseholdErrorCode, `${string}_not_found`>

/** Domain rejections. Raised by services and repositories, always surfaced. */
export class HouseholdError extends BaseError<HouseholdErrorCode> {
  static notFound(code: NotFoundCode, entity: string, id: number): HouseholdError {
    return new HouseholdError(`${entity} ${id} not found`, { code, context: { id } })
  }

  static homeNotFound(id: number): HouseholdError {
    return HouseholdError.notFound("home_not_found", "Home", id)
  }

  static taskNotFound(id: number): HouseholdError {
    return HouseholdError.notFound("task_not_found", "Task", id)
  }

  static assignmentNotFound(id: number): HouseholdError {
    return HouseholdError.notFound("assignment_not_found", "Assignment", id)
  }

  static billNotFound(id: number): HouseholdError {
    return HouseholdError.notFound("bill_not_found", "Bill", id)
  }

  static billCategoryNotFound(id: number): HouseholdError {
    return HouseholdError.notFound("bill_category_not_found", "Bill category", id)
  }

  static pollNotFound(id: number): HouseholdError {
    return HouseholdError.notFound("poll_not_found", "Poll", id)
  }

  static roomNotFound(id: number): HouseholdError {
    return HouseholdError.notFound("room_not_found", "Room", id)
  }

  static shoppingCategoryNotFound(id: number): HouseholdError {
    return HouseholdError.notFound("shopping_category_not_found", "Shopping category", id)
  }

  static shoppingItemNotFound(id: number): HouseholdError {
    return HouseholdError.notFound("shopping_item_not_found", "Shopping item", id)
  }

  static userNotFound(id: number): HouseholdError {
    return HouseholdError.notFound("user_not_found", "User", id)
  }

  static invalidInviteCode(): HouseholdError {
    return new HouseholdError("Invite code does not match any home", {
      code: "invalid_invite_code",
    })
  }

  static alreadyMember(homeId: number, userId: number): HouseholdError {
    return new HouseholdError(`User ${userId} already belongs to home ${homeId}`, {
      code: "already_member",
      context: { homeId, userId },
    })
  }

  static cannotRemoveSelf(homeId: number, userId: number): HouseholdError {
    const message = "Members cannot remove themselves; leave the home instead"
    return new HouseholdError(message, {
      code: "cannot_remove_self",
      context: { homeId, userId },
    })
  }

  static billAlreadyPaid(id: number): HouseholdError {
    return new HouseholdError(`Bill ${id} is already paid`, {
      code: "bill_already_paid",
      context: { id },
    })
  }

  static pollClosed(id: number): HouseholdError {
    return new HouseholdError(`Poll ${id} is closed`, {
      code: "poll_closed",
      context: { id },
    })
  }

  static pollAlreadyClosed(id: number): HouseholdError {
    return new HouseholdError(`Poll ${id} is already closed`, {
      code: "poll_already_closed",
      context: { id },
    })
  }

  static revoteNotAllowed(id: number): HouseholdError {
    return new HouseholdError(`Poll ${id} does not allow changing a vote`, {
      code: "revote_not_allowed",
      context: { id },
    })
  }

  static categoryNotInHome(categoryId: number, homeId: number): HouseholdError {
    const message = `Shopping category ${categoryId} does not belong to home ${homeId}`
    return new HouseholdError(message, {
      code: "category_not_in_home",
      context: { categoryId, homeId },
    })
  }
}
