export type InFlightKey = string

/**
 * `leader` ran the work itself; `inflight` joined a call another caller had
 * already started.
 */
export type FlightSource = "leader" | "inflight"

export type FlightResult<T> = {
  value: T
  isLeader: boolean

  /** Callers that joined the leader's flight, the leader excluded. */
  sharedWith: number

  source: FlightSource
}

/**
 * Coalesces concurrent calls for the same key into one execution.
 *
 * Every caller that arrives while a flight for `key` is pending shares its
 * outcome, errors included. Once the flight settles the key is free and the
 * next call starts over; nothing is cached.
 *
 * @example
 * ```ts
 * const [a, b] = await Promise.all([
 *   flights.run("countries:list", () => remote.loadCountries()),
 *   flights.run("countries:list", () => remote.loadCountries()),
 * ])
 *
 * a.isLeader // true
 * b.source // "inflight"
 * ```
 */
export interface Singleflight {
  run<R>(key: InFlightKey, fn: () => Promise<R>): Promise<FlightResult<R>>

  /** Like `run()`, but returns `undefined` instead of joining a pending flight. */
  tryRun<R>(key: InFlightKey, fn: () => Promise<R>): Promise<FlightResult<R>> | undefined

  has(key: InFlightKey): boolean

  /**
   * Detach the pending flight for `key`. Its current waiters still get its
   * outcome; the next caller starts a new one.
   */
  forget(key: InFlightKey): void

  readonly size: number
}
