import type { Singleflight } from "../singleflight"
import { deferred } from "./deferred"

export function describeSingleflightContract(name: string, factory: () => Singleflight) {
  describe(`${name} contract`, () => {
    let flights: Singleflight

    beforeEach(() => {
      flights = factory()
    })

    describe("run", () => {
      it("runs fn once for concurrent callers and shares the value", async () => {
        const list = [{ alpha3Code: "FRA" }]
        const fn = vi.fn(async () => list)

        const results = await Promise.all([
          flights.run("countries:list", fn),
          flights.run("countries:list", fn),
          flights.run("countries:list", fn),
        ])

        expect(fn).toHaveBeenCalledTimes(1)
        expect(results.map((r) => r.value)).toEqual([list, list, list])
        expect(results[0]?.value).toBe(list)
        expect(results[2]?.value).toBe(list)
      })

      it("marks one leader and the rest as inflight, all with the same sharedWith", async () => {
        const gate = deferred<string>()

        const pending = [
          flights.run("countries:list", () => gate.promise),
          flights.run("countries:list", () => gate.promise),
          flights.run("countries:list", () => gate.promise),
        ]

        gate.resolve("done")
        const results = await Promise.all(pending)

        expect(results.map((r) => r.source)).toEqual(["leader", "inflight", "inflight"])
        expect(results.map((r) => r.isLeader)).toEqual([true, false, false])
        expect(results.map((r) => r.sharedWith)).toEqual([2, 2, 2])
      })

      it("shares the same error with every caller", async () => {
        const error = new Error("remote down")
        const fn = async () => {
          throw error
        }

        const results = await Promise.allSettled([
          flights.run("countries:list", fn),
          flights.run("countries:list", fn),
        ])

        expect(results).toEqual([
          { status: "rejected", reason: error },
          { status: "rejected", reason: error },
        ])
      })

      it("turns a synchronous throw into a rejection", async () => {
        const error = new Error("bad input")

        await expect(
          flights.run("k", () => {
            throw error
          }),
        ).rejects.toBe(error)
        expect(flights.size).toBe(0)
      })

      it("does not coalesce different keys", async () => {
        const fn = vi.fn(async () => "x")

        await Promise.all([
          flights.run("countries:details:FRA", fn),
          flights.run("countries:details:DEU", fn),
        ])

        expect(fn).toHaveBeenCalledTimes(2)
      })

      it("starts a fresh flight after the previous one settled", async () => {
        const fn = vi.fn(async () => "x")

        await flights.run("k", fn)
        const second = await flights.run("k", fn)

        expect(fn).toHaveBeenCalledTimes(2)
        expect(second.isLeader).toBe(true)
      })

      it("starts a fresh flight after the previous one failed", async () => {
        await expect(flights.run("k", async () => Promise.reject(new Error("x")))).rejects.toThrow()

        const second = await flights.run("k", async () => "ok")

        expect(second).toEqual({ value: "ok", isLeader: true, sharedWith: 0, source: "leader" })
      })
    })

    describe("tryRun", () => {
      it("returns undefined while a flight is pending", async () => {
        const gate = deferred<string>()

        const first = flights.run("k", () => gate.promise)

        expect(flights.tryRun("k", async () => "other")).toBeUndefined()

        gate.resolve("value")
        await first
      })

      it("leads a new flight when none is pending", async () => {
        await expect(flights.tryRun("k", async () => "value")).resolves.toMatchObject({
          value: "value",
          isLeader: true,
        })
      })
    })

    describe("forget", () => {
      it("lets the next caller start over while earlier waiters keep their outcome", async () => {
        const first = deferred<string>()
        const second = deferred<string>()

        const a = flights.run("k", () => first.promise)
        const b = flights.run("k", () => first.promise)

        flights.forget("k")
        const c = flights.run("k", () => second.promise)

        first.resolve("one")
        second.resolve("two")

        expect((await a).value).toBe("one")
        expect((await b).value).toBe("one")
        expect(await c).toMatchObject({ value: "two", isLeader: true })
      })

      it("does not let a forgotten flight clear its successor", async () => {
        const first = deferred<string>()
        const second = deferred<string>()

        const a = flights.run("k", () => first.promise)
        flights.forget("k")
        const b = flights.run("k", () => second.promise)

        first.resolve("one")
        await a

        expect(flights.has("k")).toBe(true)

        second.resolve("two")
        await b

        expect(flights.has("k")).toBe(false)
      })

      it("ignores unknown keys", () => {
        expect(() => flights.forget("unknown")).not.toThrow()
      })
    })

    describe("size", () => {
      it("counts pending flights", async () => {
        const one = deferred<string>()
        const two = deferred<string>()

        expect(flights.size).toBe(0)

        const p1 = flights.run("k1", () => one.promise)
        const p2 = flights.run("k2", () => two.promise)
        expect(flights.size).toBe(2)

        one.resolve("x")
        await p1
        expect(flights.size).toBe(1)

        two.resolve("y")
        await p2
        expect(flights.size).toBe(0)
      })
    })
  })
}
