import type { Room } from "./room.model"

export interface RoomRepository {
  create(name: string, homeId: number): Promise<Room>
  findById(id: number): Promise<Room | null>
  listForHome(homeId: number): Promise<Room[]>
  delete(id: number): Promise<void>
}
