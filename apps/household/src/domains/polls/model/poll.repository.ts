import type { NewPoll, Poll, Vote } from "./poll.model"

export interface PollRepository {
  create(input: NewPoll): Promise<Poll>
  findById(id: number): Promise<Poll | null>
  findByOptionId(optionId: number): Promise<Poll | null>
  listForHome(homeId: number): Promise<Poll[]>
  close(id: number): Promise<void>
  delete(id: number): Promise<void>

  /** Rejects with `poll_closed` when the option's poll is no longer open. */
  vote(userId: number, optionId: number): Promise<Vote>
  unvote(userId: number, pollId: number): Promise<void>
}
