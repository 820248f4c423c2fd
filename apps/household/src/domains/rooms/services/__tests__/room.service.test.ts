import { createTestHarness, type TestHarness } from "../../../../tests/test-harness"
import type { RoomService } from "../room.service"

describe("RoomService", () => {
  let h: TestHarness
  let rooms: RoomService

  beforeEach(async () => {
    h = await createTestHarness()
    rooms = h.ctx.services.rooms
  })

  it("reads rooms through the cache", async () => {
    const room = await rooms.createRoom("Kitchen", 7)
    const findById = vi.spyOn(h.repositories.rooms, "findById")

    await rooms.getRoom(room.id)
    const again = await rooms.getRoom(room.id)

    expect(findById).toHaveBeenCalledTimes(1)
    expect(again).toEqual(room)
    expect(h.cachedKeys()).toEqual([`room:${room.id}`])
  })

  it("announces the deleted room itself", async () => {
    const room = await rooms.createRoom("Kitchen", 7)
    await rooms.getRoom(room.id)
    await rooms.getRoomsForHome(7)

    const deleted = await rooms.deleteRoom(room.id)

    expect(deleted).toEqual(room)
    expect(h.cachedKeys()).toEqual([])
    expect(h.published().at(-1)).toEqual({
      module: "ROOM",
      action: "DELETED",
      data: {
        id: room.id,
        homeId: 7,
        name: "Kitchen",
        createdAt: "2024-05-01T09:00:00.000Z",
      },
    })
  })

  it("rejects deleting a room that does not exist", async () => {
    await expect(rooms.deleteRoom(404)).rejects.toMatchObject({ code: "room_not_found" })
    expect(h.published()).toEqual([])
  })
})
