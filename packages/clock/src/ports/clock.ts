import type { Milliseconds, UnixMs } from "./time"

export type TimeSource = {
  /**
   * Current wall-clock time.
   *
   * @remarks
   * Use `nowMs()` when measuring how long an operation took.
   */
  now(): Date

  /** Current time as milliseconds since the Unix epoch. */
  nowMs(): UnixMs
}

export interface Sleeper {
  /**
   * Wait for `ms` milliseconds.
   *
   * Resolves (never rejects) as soon as `signal` is aborted, so callers must
   * check the signal afterwards if they care why the wait ended.
   */
  sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void>
}

export type Clock = TimeSource & Sleeper
