import type { Clock } from "@atlas/clock"
import { CancellationError, serializeError } from "@atlas/errors"
import type { Logger } from "@atlas/logger"
import { CancelBag } from "./cancel-bag"
import { CancellationHandle } from "./cancellation-handle"
import { failed, loaded } from "./loadable-state"
import type { LoadableSubject } from "./loadable-subject"

export type LoadTask<T> = (signal: AbortSignal) => Promise<T>

export type LoadIntoDeps = {
  logger: Logger
  clock: Clock
}

/**
 * Start `task` as the request that owns `subject`.
 *
 * The subject enters Loading right away and later settles to Loaded or
 * Failed with exactly what the task produced or threw. Once the returned bag
 * is cancelled, or a newer request takes over, nothing more is published.
 * A `CancellationError` is never published as a failure. An observer that
 * throws while the failure is published is logged at `error`.
 */
export function loadInto<T>(
  subject: LoadableSubject<T>,
  task: LoadTask<T>,
  deps: LoadIntoDeps,
): CancelBag {
  const bag = new CancelBag()
  const handle = new CancellationHandle()

  bag.store(handle)
  subject.setLoading(bag)

  run(subject, task, bag, handle, deps).catch((err: unknown) => {
    deps.logger.error("load observer failed", { err: serializeError(err) })
  })

  return bag
}

async function run<T>(
  subject: LoadableSubject<T>,
  task: LoadTask<T>,
  bag: CancelBag,
  handle: CancellationHandle,
  { logger, clock }: LoadIntoDeps,
): Promise<void> {
  const startedAt = clock.nowMs()

  try {
    const value = await task(handle.signal)

    if (!subject.settle(bag, loaded(value))) {
      logger.debug("load result discarded", { durationMs: clock.nowMs() - startedAt })
    }
  } catch (err) {
    if (handle.isCancelled || err instanceof CancellationError) {
      logger.debug("load cancelled", { durationMs: clock.nowMs() - startedAt })
      return
    }

    logger.warn("load failed", {
      durationMs: clock.nowMs() - startedAt,
      err: serializeError(err),
    })

    subject.settle(bag, failed(err))
  } finally {
    handle.complete()
  }
}
