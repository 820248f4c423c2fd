export type PollStatus = "open" | "closed"

export type PollType = "single" | "multiple"

export type Vote = {
  id: number
  userId: number
  optionId: number
}

export type PollOption = {
  id: number
  title: string
  votes: Vote[]
}

export type Poll = {
  id: number
  homeId: number
  question: string
  type: PollType
  allowRevote: boolean
  status: PollStatus
  endsAt?: Date
  options: PollOption[]
  createdAt: Date
}

export type NewPoll = {
  homeId: number
  question: string
  type: PollType
  allowRevote: boolean
  endsAt?: Date
  options: string[]
}
