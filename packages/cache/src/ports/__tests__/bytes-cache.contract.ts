import type { BytesCache } from "../bytes-cache"

const bytes = (...values: number[]) => new Uint8Array(values)

export function describeBytesCacheContract(
  name: string,
  createCache: () => BytesCache,
): void {
  describe(`BytesCache contract: ${name}`, () => {
    let cache: BytesCache

    beforeEach(() => {
      cache = createCache()
    })

    describe("get/set", () => {
      it("misses for an absent key", async () => {
        expect(await cache.get("task:1")).toStrictEqual({ kind: "miss" })
      })

      it("returns the stored bytes", async () => {
        await cache.set("task:1", bytes(1, 2, 3))

        expect(await cache.get("task:1")).toStrictEqual({
          kind: "hit",
          value: bytes(1, 2, 3),
        })
      })

      it("stores empty values", async () => {
        await cache.set("tasks:home:7", bytes())

        expect(await cache.get("tasks:home:7")).toStrictEqual({
          kind: "hit",
          value: bytes(),
        })
      })

      it("overwrites", async () => {
        await cache.set("task:1", bytes(1))
        await cache.set("task:1", bytes(2))

        expect(await cache.get("task:1")).toStrictEqual({ kind: "hit", value: bytes(2) })
      })

      it("is not affected by later mutation of the input", async () => {
        const value = bytes(1, 2, 3)
        await cache.set("task:1", value)

        value[0] = 9

        expect(await cache.get("task:1")).toStrictEqual({
          kind: "hit",
          value: bytes(1, 2, 3),
        })
      })
    })

    describe("invalidate", () => {
      it("is a no-op for an absent key", async () => {
        await expect(cache.invalidate("bill:404")).resolves.toBeUndefined()
      })

      it("removes the entry, and repeating it is harmless", async () => {
        await cache.set("bill:42", bytes(1))

        await cache.invalidate("bill:42")
        await cache.invalidate("bill:42")

        expect(await cache.get("bill:42")).toStrictEqual({ kind: "miss" })
      })
    })

    describe("bulk operations", () => {
      it("getMany([]) is empty", async () => {
        expect(await cache.getMany([])).toStrictEqual(new Map())
      })

      it("getMany reports hits and misses per key", async () => {
        await cache.set("room:1", bytes(1))

        const res = await cache.getMany(["room:1", "room:2"])

        expect(res).toStrictEqual(
          new Map([
            ["room:1", { kind: "hit", value: bytes(1) }],
            ["room:2", { kind: "miss" }],
          ]),
        )
      })

      it("setMany writes every entry", async () => {
        await cache.setMany([
          ["poll:1", bytes(1)],
          ["poll:2", bytes(2)],
        ])

        expect(await cache.get("poll:2")).toStrictEqual({ kind: "hit", value: bytes(2) })
      })

      it("invalidateMany removes only the given keys", async () => {
        await cache.setMany([
          ["poll:1", bytes(1)],
          ["poll:2", bytes(2)],
          ["poll:3", bytes(3)],
        ])

        await cache.invalidateMany(["poll:1", "poll:3", "poll:404"])

        expect(await cache.get("poll:1")).toStrictEqual({ kind: "miss" })
        expect(await cache.get("poll:2")).toStrictEqual({ kind: "hit", value: bytes(2) })
        expect(await cache.get("poll:3")).toStrictEqual({ kind: "miss" })
      })
    })
  })
}
