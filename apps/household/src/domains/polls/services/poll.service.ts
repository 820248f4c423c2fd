import type { SafeDataCache } from "@hearth/cache"
import { DomainAction, DomainModule, domainEvent } from "@hearth/events"
import { HouseholdKeys } from "../../../keyspace"
import type { CallOptions, DomainServiceDeps } from "../../../lib/service-deps"
import { HouseholdError } from "../../household.errors"
import type { NewPoll, Poll, Vote } from "../model/poll.model"
import type { PollRepository } from "../model/poll.repository"

export class PollService {
  private readonly pollCache: SafeDataCache<Poll>
  private readonly pollListCache: SafeDataCache<Poll[]>

  constructor(private readonly deps: DomainServiceDeps<PollRepository>) {
    this.pollCache = deps.cache<Poll>()
    this.pollListCache = deps.cache<Poll[]>()
  }

  createPoll(input: NewPoll, opts: CallOptions = {}): Promise<Poll> {
    return this.deps.coordinator.mutate(
      {
        name: "createPoll",
        invalidate: () => [HouseholdKeys.pollsForHome(input.homeId)],
        write: () => this.deps.repository.create(input),
        event: (poll) => domainEvent(DomainModule.Poll, DomainAction.Created, poll),
      },
      opts,
    )
  }

  getPoll(id: number, opts: CallOptions = {}): Promise<Poll> {
    return this.deps.coordinator.read(
      this.pollCache,
      HouseholdKeys.poll(id),
      () => this.findPoll(id),
      opts,
    )
  }

  getPollsForHome(homeId: number, opts: CallOptions = {}): Promise<Poll[]> {
    return this.deps.coordinator.read(
      this.pollListCache,
      HouseholdKeys.pollsForHome(homeId),
      () => this.deps.repository.listForHome(homeId),
      opts,
    )
  }

  /** Open to closed is terminal. */
  closePoll(pollId: number, homeId: number, opts: CallOptions = {}): Promise<void> {
    return this.deps.coordinator.mutate(
      {
        name: "closePoll",
        resolve: async () => {
          const poll = await this.findPoll(pollId)
          if (poll.status === "closed") throw HouseholdError.pollAlreadyClosed(pollId)
          return poll
        },
        invalidate: () => this.keysFor(pollId, homeId),
        write: () => this.deps.repository.close(pollId),
        event: () => domainEvent(DomainModule.Poll, DomainAction.Closed, { id: pollId }),
      },
      opts,
    )
  }

  deletePoll(pollId: number, homeId: number, opts: CallOptions = {}): Promise<void> {
    return this.deps.coordinator.mutate(
      {
        name: "deletePoll",
        invalidate: () => this.keysFor(pollId, homeId),
        write: () => this.deps.repository.delete(pollId),
        event: () => domainEvent(DomainModule.Poll, DomainAction.Deleted, { id: pollId }),
      },
      opts,
    )
  }

  /** The repository refuses votes on closed polls. */
  vote(
    userId: number,
    optionId: number,
    homeId: number,
    opts: CallOptions = {},
  ): Promise<Vote> {
    return this.deps.coordinator.mutate(
      {
        name: "vote",
        resolve: async () => {
          const poll = await this.deps.repository.findByOptionId(optionId)
          if (poll === null) throw HouseholdError.pollNotFound(optionId)
          return poll
        },
        invalidate: (poll) => this.keysFor(poll.id, homeId),
        write: () => this.deps.repository.vote(userId, optionId),
        event: (vote) => domainEvent(DomainModule.Poll, DomainAction.Voted, vote),
      },
      opts,
    )
  }

  unvote(
    userId: number,
    pollId: number,
    homeId: number,
    opts: CallOptions = {},
  ): Promise<void> {
    return this.deps.coordinator.mutate(
      {
        name: "unvote",
        resolve: async () => {
          const poll = await this.findPoll(pollId)
          if (poll.status === "closed") throw HouseholdError.pollClosed(pollId)
          if (!poll.allowRevote) throw HouseholdError.revoteNotAllowed(pollId)
          return poll
        },
        invalidate: () => this.keysFor(pollId, homeId),
        write: () => this.deps.repository.unvote(userId, pollId),
        event: () =>
          domainEvent(DomainModule.Poll, DomainAction.Unvoted, { userId, pollId }),
      },
      opts,
    )
  }

  private keysFor(pollId: number, homeId: number): string[] {
    return [HouseholdKeys.poll(pollId), HouseholdKeys.pollsForHome(homeId)]
  }

  private async findPoll(id: number): Promise<Poll> {
    const poll = await this.deps.repository.findById(id)
    if (poll === null) throw HouseholdError.pollNotFound(id)
    return poll
  }
}
