import type { Bill } from "../domains/bills/model/bill.model"
import { createTestHarness, type TestHarness } from "../tests/test-harness"

describe("household cache-aside flows", () => {
  let h: TestHarness

  beforeEach(async () => {
    h = await createTestHarness()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("a new task shows up in the next read of its home's list", async () => {
    const tasks = h.ctx.services.tasks
    expect(await tasks.getTasksForHome(7)).toEqual([])

    const task = await tasks.createTask({
      homeId: 7,
      name: "Water plants",
      description: "",
      scheduleType: "daily",
    })

    expect(h.cachedKeys()).toEqual([])
    expect(await tasks.getTasksForHome(7)).toEqual([task])
    expect(h.cachedKeys()).toEqual(["tasks:home:7"])
  })

  it("paying bill 42 drops its entry before the write and broadcasts the paid bill", async () => {
    const bill42: Bill = {
      id: 42,
      homeId: 7,
      type: "water",
      payed: false,
      totalAmount: 31.2,
      periodStart: new Date("2024-03-01T00:00:00.000Z"),
      periodEnd: new Date("2024-03-31T00:00:00.000Z"),
      uploadedBy: 1,
      createdAt: new Date("2024-04-02T08:00:00.000Z"),
    }
    h.repositories.bills.rows.set(42, bill42)
    const bills = h.ctx.services.bills
    await bills.getBill(42)
    expect(h.cachedKeys()).toEqual(["bill:42"])

    const markPaid = h.repositories.bills.markPaid.bind(h.repositories.bills)
    let keysDuringWrite: string[] = []
    vi.spyOn(h.repositories.bills, "markPaid").mockImplementation(async (id, paidAt) => {
      keysDuringWrite = h.cachedKeys()
      return markPaid(id, paidAt)
    })

    await bills.markBillPaid(42)

    expect(keysDuringWrite).toEqual([])
    expect(h.published()).toEqual([
      {
        module: "BILL",
        action: "MARKED_PAYED",
        data: {
          id: 42,
          homeId: 7,
          type: "water",
          payed: true,
          paymentDate: "2024-05-01T09:00:00.000Z",
          totalAmount: 31.2,
          periodStart: "2024-03-01T00:00:00.000Z",
          periodEnd: "2024-03-31T00:00:00.000Z",
          uploadedBy: 1,
          createdAt: "2024-04-02T08:00:00.000Z",
        },
      },
    ])
    expect(await bills.getBill(42)).toEqual({
      ...bill42,
      payed: true,
      paymentDate: new Date("2024-05-01T09:00:00.000Z"),
    })
  })

  it("a vote on a closed poll is rejected and never announced", async () => {
    const polls = h.ctx.services.polls
    const poll = await polls.createPoll({
      homeId: 7,
      question: "Movie night?",
      type: "single",
      allowRevote: false,
      options: ["Friday", "Saturday"],
    })
    await polls.closePoll(poll.id, 7)
    await polls.getPoll(poll.id)
    await polls.getPollsForHome(7)

    await expect(polls.vote(3, poll.options[1]?.id ?? 0, 7)).rejects.toMatchObject({
      code: "poll_closed",
    })

    expect(h.published().map((e) => e.action)).toEqual(["CREATED", "CLOSED"])
    expect(h.cachedKeys()).toEqual([])
    expect((await polls.getPoll(poll.id)).options.flatMap((o) => o.votes)).toEqual([])
  })

  it("a cache store that stops answering falls back to the repository in time", async () => {
    const tasks = h.ctx.services.tasks
    for (let i = 1; i <= 10; i++) {
      await tasks.createTask({
        homeId: 7,
        name: `Chore ${i}`,
        description: "",
        scheduleType: "weekly",
      })
    }

    vi.useFakeTimers()
    vi.spyOn(h.redis, "get").mockImplementation(
      () => new Promise<Buffer | null>(() => {}),
    )

    const read = tasks.getTask(10)
    await vi.advanceTimersByTimeAsync(250)

    await expect(read).resolves.toMatchObject({ id: 10, name: "Chore 10" })
    expect(h.logger.at("warn")).toEqual([
      expect.objectContaining({
        message: "Cache get failed; continuing without cache",
        fields: expect.objectContaining({ key: "task:10" }),
      }),
    ])
  })

  it("a failed invalidation leaves the stale list only until its TTL runs out", async () => {
    const rooms = h.ctx.services.rooms
    expect(await rooms.getRoomsForHome(7)).toEqual([])
    vi.spyOn(h.redis, "del").mockRejectedValue(new Error("ECONNREFUSED"))

    const room = await rooms.createRoom("Kitchen", 7)

    expect(h.published()).toMatchObject([{ module: "ROOM", action: "CREATED" }])
    expect(await rooms.getRoomsForHome(7)).toEqual([])

    h.clock.advance(3600 * 1000)

    expect(await rooms.getRoomsForHome(7)).toEqual([room])
  })
})
