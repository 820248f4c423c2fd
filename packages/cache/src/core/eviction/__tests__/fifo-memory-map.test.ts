import { FifoMemoryMap } from "../fifo-memory-map"
import { describeEvictionMapContract } from "./eviction-map.contract"

describeEvictionMapContract("FifoMemoryMap", () => new FifoMemoryMap())

describe("FifoMemoryMap behavior", () => {
  it("ignores reads and overwrites when choosing a victim", () => {
    const map = new FifoMemoryMap<string, number>()
    map.set("a", 1)
    map.set("b", 2)

    map.get("a")
    map.set("a", 3)

    expect(map.victim()).toBe("a")
  })
})
