import type { CacheKey, SafeDataCache } from "@hearth/cache"
import { DomainAction, DomainModule, domainEvent } from "@hearth/events"
import { HouseholdKeys, homeScopedKeys } from "../../../keyspace"
import type { CallOptions, DomainServiceDeps } from "../../../lib/service-deps"
import { HouseholdError } from "../../household.errors"
import type { Home, HomeDependents, NewHome } from "../model/home.model"
import type { HomeRepository } from "../model/home.repository"

export type Membership = {
  homeId: number
  userId: number
}

export class HomeService {
  private readonly homeCache: SafeDataCache<Home>

  constructor(private readonly deps: DomainServiceDeps<HomeRepository>) {
    this.homeCache = deps.cache<Home>()
  }

  createHome(input: NewHome, opts: CallOptions = {}): Promise<Home> {
    return this.deps.coordinator.mutate(
      {
        name: "createHome",
        invalidate: () => [],
        write: () => this.deps.repository.create(input),
        event: (home) => domainEvent(DomainModule.Home, DomainAction.Created, home),
      },
      opts,
    )
  }

  getHome(id: number, opts: CallOptions = {}): Promise<Home> {
    return this.deps.coordinator.read(
      this.homeCache,
      HouseholdKeys.home(id),
      () => this.findHome(id),
      opts,
    )
  }

  joinHomeByCode(
    code: string,
    userId: number,
    opts: CallOptions = {},
  ): Promise<Membership> {
    return this.deps.coordinator.mutate(
      {
        name: "joinHomeByCode",
        resolve: async () => {
          const home = await this.deps.repository.findByInviteCode(code)
          if (home === null) throw HouseholdError.invalidInviteCode()
          if (home.members.some((m) => m.userId === userId)) {
            throw HouseholdError.alreadyMember(home.id, userId)
          }
          return home
        },
        invalidate: (home) => [HouseholdKeys.home(home.id)],
        write: async (home) => {
          await this.deps.repository.addMember(home.id, userId, "member")
          return { homeId: home.id, userId }
        },
        event: (membership) =>
          domainEvent(DomainModule.Home, DomainAction.MemberJoined, membership),
      },
      opts,
    )
  }

  leaveHome(homeId: number, userId: number, opts: CallOptions = {}): Promise<Membership> {
    return this.deps.coordinator.mutate(
      {
        name: "leaveHome",
        invalidate: () => [HouseholdKeys.home(homeId)],
        write: async () => {
          await this.deps.repository.removeMember(homeId, userId)
          return { homeId, userId }
        },
        event: (membership) =>
          domainEvent(DomainModule.Home, DomainAction.MemberLeft, membership),
      },
      opts,
    )
  }

  removeMember(
    homeId: number,
    userId: number,
    currentUserId: number,
    opts: CallOptions = {},
  ): Promise<Membership> {
    return this.deps.coordinator.mutate(
      {
        name: "removeMember",
        resolve: async () => {
          if (userId === currentUserId) {
            throw HouseholdError.cannotRemoveSelf(homeId, userId)
          }
          return { homeId, userId }
        },
        invalidate: () => [HouseholdKeys.home(homeId)],
        write: async (membership) => {
          await this.deps.repository.removeMember(homeId, userId)
          return membership
        },
        event: (membership) =>
          domainEvent(DomainModule.Home, DomainAction.MemberRemoved, membership),
      },
      opts,
    )
  }

  /** Drops the home entry, every list hanging off it and every cached row it owned. */
  deleteHome(id: number, opts: CallOptions = {}): Promise<void> {
    return this.deps.coordinator.mutate(
      {
        name: "deleteHome",
        resolve: () => this.deps.repository.findDependents(id),
        invalidate: (owned) => [
          HouseholdKeys.home(id),
          ...homeScopedKeys(id),
          ...dependentKeys(owned),
        ],
        write: () => this.deps.repository.delete(id),
        event: () => domainEvent(DomainModule.Home, DomainAction.Deleted, { id }),
      },
      opts,
    )
  }

  private async findHome(id: number): Promise<Home> {
    const home = await this.deps.repository.findById(id)
    if (home === null) throw HouseholdError.homeNotFound(id)
    return home
  }
}

function dependentKeys(owned: HomeDependents): CacheKey[] {
  return [
    ...owned.taskIds.map(HouseholdKeys.task),
    ...owned.assignments.flatMap((a) => [
      HouseholdKeys.assignment(a.id),
      HouseholdKeys.assignmentsForUser(a.userId),
      HouseholdKeys.closestAssignmentForUser(a.userId),
    ]),
    ...owned.billIds.map(HouseholdKeys.bill),
    ...owned.pollIds.map(HouseholdKeys.poll),
    ...owned.roomIds.map(HouseholdKeys.room),
    ...owned.shoppingCategoryIds.map(HouseholdKeys.shoppingCategory),
  ]
}
