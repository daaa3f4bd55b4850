import type { Milliseconds, Sleeper } from "@atlas/clock"

export type TimeSpanOptions = {
  clock: Sleeper
  floorMs: Milliseconds
  signal?: AbortSignal
}

/**
 * Run `work`, resolving no sooner than `floorMs` after it started.
 *
 * Work slower than the floor resolves as soon as it is done; a failure
 * rejects at once, without waiting for the floor. Aborting `signal` ends the
 * wait early.
 */
export async function ensureTimeSpan<T>(
  work: () => Promise<T>,
  { clock, floorMs, signal }: TimeSpanOptions,
): Promise<T> {
  if (floorMs <= 0) return await work()

  const wait = new AbortController()
  const stopWaiting = () => wait.abort()

  if (signal?.aborted) wait.abort()
  signal?.addEventListener("abort", stopWaiting, { once: true })

  try {
    const [value] = await Promise.all([
      work().catch((err: unknown) => {
        wait.abort()
        throw err
      }),
      clock.sleep(floorMs, wait.signal),
    ])

    return value
  } finally {
    signal?.removeEventListener("abort", stopWaiting)
  }
}
