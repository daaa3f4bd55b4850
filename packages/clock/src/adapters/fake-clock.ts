import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Manually driven clock for tests.
 *
 * `sleep()` never waits on a timer: it moves the clock forward by the
 * requested duration and resolves on the next microtask. Every requested
 * duration is recorded in `sleeps`, which lets tests assert how long code
 * asked to wait without actually waiting.
 */
export class FakeClock implements Clock {
  readonly sleeps: Milliseconds[] = []
  private time: UnixMs

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    this.sleeps.push(ms)

    if (ms <= 0 || signal?.aborted) return

    this.advance(ms)
  }
}
