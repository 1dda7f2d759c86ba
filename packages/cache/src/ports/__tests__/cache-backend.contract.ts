import { bytes, keys } from "../../tests/utils/cache-test-helpers"
import type { CacheBackend } from "../cache-health"

export function describeCacheBackendContract(
  adapterName: string,
  createCache: () => CacheBackend,
): void {
  describe(`CacheBackend contract - ${adapterName}`, () => {
    let cache: CacheBackend

    beforeEach(() => {
      cache = createCache()
    })

    describe("entries", () => {
      it("returns miss when the key is absent", async () => {
        expect(await cache.get("missing")).toStrictEqual({ kind: "miss" })
      })

      it("returns the bytes that were set", async () => {
        await cache.set(keys.one(), bytes.a())

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.a() })
      })

      it("stores empty values", async () => {
        await cache.set(keys.one(), bytes.empty())

        expect(await cache.get(keys.one())).toStrictEqual({
          kind: "hit",
          value: bytes.empty(),
        })
      })

      it("overwrites on set", async () => {
        await cache.set(keys.one(), bytes.a())
        await cache.set(keys.one(), bytes.b())

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.b() })
      })

      it("does not keep a reference to the input", async () => {
        const value = bytes.a()
        await cache.set(keys.one(), value)
        value[0] = 42

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "hit", value: bytes.a() })
      })

      it("invalidate removes the entry and is idempotent", async () => {
        await cache.set(keys.one(), bytes.a())

        await cache.invalidate(keys.one())
        await cache.invalidate(keys.one())

        expect(await cache.get(keys.one())).toStrictEqual({ kind: "miss" })
      })

      it("exists reflects presence", async () => {
        expect(await cache.exists(keys.one())).toBe(false)

        await cache.set(keys.one(), bytes.a())

        expect(await cache.exists(keys.one())).toBe(true)
      })
    })

    describe("getMany", () => {
      it("returns an empty map for no keys", async () => {
        expect(await cache.getMany([])).toStrictEqual(new Map())
      })

      it("aligns results to keys, with misses for absent keys", async () => {
        await cache.set(keys.one(), bytes.a())
        await cache.set(keys.two(), bytes.b())

        const res = await cache.getMany([keys.two(), "missing", keys.one()])

        expect([...res.entries()]).toStrictEqual([
          [keys.two(), { kind: "hit", value: bytes.b() }],
          ["missing", { kind: "miss" }],
          [keys.one(), { kind: "hit", value: bytes.a() }],
        ])
      })

      it("de-dupes keys, keeping first-seen order", async () => {
        await cache.set(keys.one(), bytes.a())

        const res = await cache.getMany([keys.one(), keys.two(), keys.one()])

        expect([...res.keys()]).toStrictEqual([keys.one(), keys.two()])
      })
    })

    describe("sets", () => {
      it("a missing set is empty", async () => {
        expect(await cache.getSet(keys.set())).toStrictEqual([])
      })

      it("adds members once", async () => {
        await cache.addToSet(keys.set(), ["a", "b"])
        await cache.addToSet(keys.set(), ["b", "c"])

        expect((await cache.getSet(keys.set())).sort()).toStrictEqual(["a", "b", "c"])
      })

      it("removes members, ignoring absent ones", async () => {
        await cache.addToSet(keys.set(), ["a", "b"])

        await cache.removeFromSet(keys.set(), ["a", "zzz"])

        expect(await cache.getSet(keys.set())).toStrictEqual(["b"])
      })

      it("a set emptied by removal no longer exists", async () => {
        await cache.addToSet(keys.set(), ["a"])
        await cache.removeFromSet(keys.set(), ["a"])

        expect(await cache.exists(keys.set())).toBe(false)
      })

      it("deleteSet removes the whole set", async () => {
        await cache.addToSet(keys.set(), ["a", "b"])

        await cache.deleteSet(keys.set())

        expect(await cache.getSet(keys.set())).toStrictEqual([])
      })

      it("adding or removing no members is a no-op", async () => {
        await cache.addToSet(keys.set(), [])
        await cache.removeFromSet(keys.set(), [])

        expect(await cache.exists(keys.set())).toBe(false)
      })
    })

    describe("cancellation", () => {
      it("rejects when the signal is already aborted", async () => {
        const ac = new AbortController()
        ac.abort()

        await expect(cache.get(keys.one(), { signal: ac.signal })).rejects.toBeDefined()
      })
    })

    it("ping resolves", async () => {
      await expect(cache.ping()).resolves.toBeUndefined()
    })
  })
}
