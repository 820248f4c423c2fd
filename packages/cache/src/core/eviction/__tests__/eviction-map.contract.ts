import type { EvictionMap } from "../eviction-map"

export function describeEvictionMapContract(
  name: string,
  make: () => EvictionMap<string, number>,
) {
  describe(`EvictionMap contract: ${name}`, () => {
    let map: EvictionMap<string, number>

    beforeEach(() => {
      map = make()
    })

    it("starts empty with no victim", () => {
      expect(map.size()).toBe(0)
      expect(map.victim()).toBeUndefined()
    })

    it("stores, overwrites and deletes", () => {
      map.set("a", 1)
      map.set("a", 2)

      expect(map.get("a")).toBe(2)
      expect(map.size()).toBe(1)
      expect(map.delete("a")).toBe(true)
      expect(map.delete("a")).toBe(false)
      expect(map.has("a")).toBe(false)
    })

    it("names the first inserted key as victim when nothing was read", () => {
      map.set("a", 1)
      map.set("b", 2)

      expect(map.victim()).toBe("a")
    })
  })
}
