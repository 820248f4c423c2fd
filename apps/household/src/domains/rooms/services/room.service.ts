import type { SafeDataCache } from "@hearth/cache"
import { DomainAction, DomainModule, domainEvent } from "@hearth/events"
import { HouseholdKeys } from "../../../keyspace"
import type { CallOptions, DomainServiceDeps } from "../../../lib/service-deps"
import { HouseholdError } from "../../household.errors"
import type { Room } from "../model/room.model"
import type { RoomRepository } from "../model/room.repository"

export class RoomService {
  private readonly roomCache: SafeDataCache<Room>
  private readonly roomListCache: SafeDataCache<Room[]>

  constructor(private readonly deps: DomainServiceDeps<RoomRepository>) {
    this.roomCache = deps.cache<Room>()
    this.roomListCache = deps.cache<Room[]>()
  }

  createRoom(name: string, homeId: number, opts: CallOptions = {}): Promise<Room> {
    return this.deps.coordinator.mutate(
      {
        name: "createRoom",
        invalidate: () => [HouseholdKeys.roomsForHome(homeId)],
        write: () => this.deps.repository.create(name, homeId),
        event: (room) => domainEvent(DomainModule.Room, DomainAction.Created, room),
      },
      opts,
    )
  }

  getRoom(id: number, opts: CallOptions = {}): Promise<Room> {
    return this.deps.coordinator.read(
      this.roomCache,
      HouseholdKeys.room(id),
      () => this.findRoom(id),
      opts,
    )
  }

  getRoomsForHome(homeId: number, opts: CallOptions = {}): Promise<Room[]> {
    return this.deps.coordinator.read(
      this.roomListCache,
      HouseholdKeys.roomsForHome(homeId),
      () => this.deps.repository.listForHome(homeId),
      opts,
    )
  }

  /** The event carries the deleted room, not just its id. */
  deleteRoom(id: number, opts: CallOptions = {}): Promise<Room> {
    return this.deps.coordinator.mutate(
      {
        name: "deleteRoom",
        resolve: () => this.findRoom(id),
        invalidate: (room) => [
          HouseholdKeys.room(room.id),
          HouseholdKeys.roomsForHome(room.homeId),
        ],
        write: async (room) => {
          await this.deps.repository.delete(room.id)
          return room
        },
        event: (room) => domainEvent(DomainModule.Room, DomainAction.Deleted, room),
      },
      opts,
    )
  }

  private async findRoom(id: number): Promise<Room> {
    const room = await this.deps.repository.findById(id)
    if (room === null) throw HouseholdError.roomNotFound(id)
    return room
  }
}
