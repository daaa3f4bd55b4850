import type { FlightResult, InFlightKey, Singleflight } from "../../ports/singleflight"

type InFlight<T> = {
  promise: Promise<T>
  followers: number
}

/**
 * Process-local {@link Singleflight}. Coalescing only spans callers sharing
 * this instance.
 */
export class MemorySingleflight implements Singleflight {
  private readonly flights = new Map<InFlightKey, InFlight<unknown>>()

  async run<R>(key: InFlightKey, fn: () => Promise<R>): Promise<FlightResult<R>> {
    const existing = this.flights.get(key) as InFlight<R> | undefined

    if (existing) {
      existing.followers++
      const value = await existing.promise

      return { value, isLeader: false, sharedWith: existing.followers, source: "inflight" }
    }

    const flight: InFlight<R> = { promise: invoke(fn), followers: 0 }

    this.flights.set(key, flight)

    try {
      const value = await flight.promise

      return { value, isLeader: true, sharedWith: flight.followers, source: "leader" }
    } finally {
      if (this.flights.get(key) === flight) this.flights.delete(key)
    }
  }

  tryRun<R>(key: InFlightKey, fn: () => Promise<R>): Promise<FlightResult<R>> | undefined {
    if (this.flights.has(key)) return undefined

    return this.run(key, fn)
  }

  has(key: InFlightKey): boolean {
    return this.flights.has(key)
  }

  forget(key: InFlightKey): void {
    this.flights.delete(key)
  }

  get size(): number {
    return this.flights.size
  }
}

/** Runs `fn` now; a synchronous throw becomes a rejection shared by the flight. */
function invoke<R>(fn: () => Promise<R>): Promise<R> {
  try {
    return fn()
  } catch (err) {
    return Promise.reject(err)
  }
}
