export type MemberRole = "owner" | "member"

export type HomeMember = {
  userId: number
  role: MemberRole
}

export type Home = {
  id: number
  name: string
  inviteCode: string
  createdAt: Date
  members: HomeMember[]
}

export type NewHome = {
  name: string
  /** Joins as `owner`. */
  ownerId: number
}

/** Rows owned by a home that go with it when it is deleted. */
export type HomeDependents = {
  taskIds: number[]
  assignments: { id: number; userId: number }[]
  billIds: number[]
  pollIds: number[]
  roomIds: number[]
  shoppingCategoryIds: number[]
}
