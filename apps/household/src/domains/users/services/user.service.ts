import { DomainAction, DomainModule, domainEvent } from "@hearth/events"
import type { CallOptions, DomainServiceDeps } from "../../../lib/service-deps"
import { HouseholdError } from "../../household.errors"
import type { User } from "../model/user.model"
import type { UserRepository } from "../model/user.repository"

/** Users are read straight from the repository; only their updates are broadcast. */
export class UserService {
  constructor(private readonly deps: Omit<DomainServiceDeps<UserRepository>, "cache">) {}

  async getUser(id: number): Promise<User> {
    const user = await this.deps.repository.findById(id)
    if (user === null) throw HouseholdError.userNotFound(id)
    return user
  }

  updateName(id: number, name: string, opts: CallOptions = {}): Promise<User> {
    return this.update(
      "updateUserName",
      id,
      () => this.deps.repository.updateName(id, name),
      opts,
    )
  }

  updateAvatar(id: number, path: string, opts: CallOptions = {}): Promise<User> {
    return this.update(
      "updateUserAvatar",
      id,
      () => this.deps.repository.updateAvatar(id, path),
      opts,
    )
  }

  private update(
    name: string,
    id: number,
    write: () => Promise<User | null>,
    opts: CallOptions,
  ): Promise<User> {
    return this.deps.coordinator.mutate(
      {
        name,
        invalidate: () => [],
        write: async () => {
          const user = await write()
          if (user === null) throw HouseholdError.userNotFound(id)
          return user
        },
        event: (user) => domainEvent(DomainModule.User, DomainAction.Updated, user),
      },
      opts,
    )
  }
}
