import { MemoryLogger } from "@hearth/logger"
import { MemoryEventChannel } from "../memory-event-channel"

describe("MemoryEventChannel", () => {
  it("fans out to every subscriber of the channel and reports the count", async () => {
    const channel = new MemoryEventChannel()
    const a = vi.fn()
    const b = vi.fn()
    const other = vi.fn()

    await channel.subscribe("updates", a)
    await channel.subscribe("updates", b)
    await channel.subscribe("audit", other)

    expect(await channel.publish("updates", "hello")).toBe(2)
    expect(a).toHaveBeenCalledWith("hello")
    expect(b).toHaveBeenCalledWith("hello")
    expect(other).not.toHaveBeenCalled()
  })

  it("reports zero subscribers when nobody listens", async () => {
    expect(await new MemoryEventChannel().publish("updates", "hello")).toBe(0)
  })

  it("keeps delivering when one listener throws and logs the failure", async () => {
    const logger = new MemoryLogger()
    const channel = new MemoryEventChannel({ logger })
    const after = vi.fn()
    const boom = new Error("boom")

    await channel.subscribe("updates", () => {
      throw boom
    })
    await channel.subscribe("updates", after)

    await channel.publish("updates", "hello")

    expect(after).toHaveBeenCalledOnce()
    expect(logger.entries).toEqual([
      {
        level: "warn",
        message: "Event listener failed",
        fields: { channel: "updates", err: boom },
      },
    ])
  })

  it("records published messages until cleared", async () => {
    const channel = new MemoryEventChannel()
    await channel.publish("updates", "one")
    await channel.publish("audit", "two")

    expect(channel.published).toEqual([
      { channel: "updates", message: "one" },
      { channel: "audit", message: "two" },
    ])

    channel.clear()

    expect(channel.published).toEqual([])
  })

  it("removes the listener on unsubscribe", async () => {
    const channel = new MemoryEventChannel()
    const listener = vi.fn()

    const unsubscribe = await channel.subscribe("updates", listener)
    await unsubscribe()
    await channel.publish("updates", "hello")

    expect(listener).not.toHaveBeenCalled()
    expect(channel.subscriberCount("updates")).toBe(0)
  })
})
