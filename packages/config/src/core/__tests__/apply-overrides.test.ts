import { applyOverrides } from "../apply-overrides"

class Backend {
  constructor(readonly name: string) {}
}

describe("applyOverrides", () => {
  const base = {
    countries: { refreshFloorMs: 500, coalesce: true },
    store: { driver: "memory", backend: new Backend("memory") },
    tags: ["a", "b"],
  }

  it("returns the base when there is nothing to apply", () => {
    expect(applyOverrides(base)).toBe(base)
  })

  it("merges nested plain objects", () => {
    const result = applyOverrides(base, { countries: { refreshFloorMs: 0 } })

    expect(result.countries).toEqual({ refreshFloorMs: 0, coalesce: true })
    expect(base.countries.refreshFloorMs).toBe(500)
  })

  it("replaces class instances and arrays whole", () => {
    const backend = new Backend("redis")
    const result = applyOverrides(base, { store: { backend }, tags: ["c"] })

    expect(result.store.backend).toBe(backend)
    expect(result.store.driver).toBe("memory")
    expect(result.tags).toEqual(["c"])
  })

  it("ignores undefined overrides", () => {
    const result = applyOverrides(base, { countries: { coalesce: undefined } })

    expect(result.countries.coalesce).toBe(true)
  })
})
