import { bytes } from "../../../tests/utils/cache-test-helpers"
import { ManualTestClock } from "../../../tests/utils/manual-test-clock"
import { createMemoryLruStore } from "../create"
import { MemoryLruStore } from "../memory-lru-store"

describe("MemoryLruStore (behavior)", () => {
  let clock: ManualTestClock
  let store: MemoryLruStore

  beforeEach(() => {
    clock = new ManualTestClock(new Date("2024-01-15T10:00:00.000Z"))
    store = new MemoryLruStore({ clock })
  })

  describe("expiry boundary", () => {
    it("an entry is expired exactly at its deadline", async () => {
      await store.write("ns", "a", bytes.a(), { maxSize: 2, ttlMs: 1000 })

      clock.advanceMs(999)
      await expect(store.exists("ns", "a")).resolves.toBe(true)

      clock.advanceMs(1)
      await expect(store.exists("ns", "a")).resolves.toBe(false)
    })
  })

  describe("expired entries and capacity", () => {
    it("an overflowing write drops unobserved expired entries without reporting them", async () => {
      await store.write("ns", "a", bytes.a(), { maxSize: 2, ttlMs: 100 })
      await store.write("ns", "b", bytes.a(), { maxSize: 2 })

      clock.advanceMs(200)

      await expect(store.write("ns", "c", bytes.a(), { maxSize: 2 })).resolves.toStrictEqual([])
      await expect(store.members("ns")).resolves.toStrictEqual(["b", "c"])
    })

    it("an expired entry stays until a write overflows or it is observed", async () => {
      await store.write("ns", "a", bytes.a(), { maxSize: 3, ttlMs: 100 })
      await store.write("ns", "b", bytes.a(), { maxSize: 3 })

      clock.advanceMs(200)
      await store.write("ns", "c", bytes.a(), { maxSize: 3 })

      await expect(store.clear("ns")).resolves.toBe(3)
    })

    it("members prunes expired entries", async () => {
      await store.write("ns", "a", bytes.a(), { maxSize: 3, ttlMs: 100 })
      await store.write("ns", "b", bytes.a(), { maxSize: 3 })

      clock.advanceMs(200)

      await expect(store.members("ns")).resolves.toStrictEqual(["b"])
      await expect(store.clear("ns")).resolves.toBe(1)
    })
  })

  describe("value isolation", () => {
    it("mutating the written array does not change the stored value", async () => {
      const value = bytes.a()
      await store.write("ns", "a", value, { maxSize: 1 })

      value[0] = 42

      await expect(store.read("ns", "a", { touch: false })).resolves.toStrictEqual({
        kind: "hit",
        value: bytes.a(),
      })
    })

    it("mutating a read result does not change the stored value", async () => {
      await store.write("ns", "a", bytes.a(), { maxSize: 1 })

      const first = await store.read("ns", "a", { touch: false })
      if (first.kind === "hit") first.value[0] = 42

      await expect(store.read("ns", "a", { touch: false })).resolves.toStrictEqual({
        kind: "hit",
        value: bytes.a(),
      })
    })
  })

  describe("sliding expiry", () => {
    it("a sliding read also refreshes recency", async () => {
      await store.write("ns", "a", bytes.a(), { maxSize: 2, ttlMs: 1000 })
      await store.write("ns", "b", bytes.a(), { maxSize: 2, ttlMs: 1000 })

      await store.read("ns", "a", { touch: true, slidingTtlMs: 1000 })

      await expect(store.write("ns", "c", bytes.a(), { maxSize: 2 })).resolves.toStrictEqual([
        "b",
      ])
    })
  })

  describe("createMemoryLruStore", () => {
    it("uses the injected clock", async () => {
      const created = createMemoryLruStore({ clock })
      await created.write("ns", "a", bytes.a(), { maxSize: 1, ttlMs: 50 })

      clock.advanceMs(50)

      await expect(created.read("ns", "a", { touch: true })).resolves.toStrictEqual({
        kind: "miss",
      })
    })

    it("defaults to the system clock", async () => {
      const created = createMemoryLruStore()
      await created.write("ns", "a", bytes.a(), { maxSize: 1, ttlMs: 60_000 })

      await expect(created.exists("ns", "a")).resolves.toBe(true)
    })
  })
})
