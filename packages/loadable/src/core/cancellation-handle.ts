import { CancellationError } from "@atlas/errors"
import type { Cancellable } from "../ports/cancellable"
import { releaseFromBag } from "./cancel-bag"

/**
 * Token for one asynchronous operation, backed by an AbortController.
 *
 * The operation reads `signal`; its owner calls `cancel()`. Once the
 * operation calls `complete()`, cancelling is a no-op and the handle leaves
 * its bag.
 */
export class CancellationHandle implements Cancellable {
  private readonly controller = new AbortController()
  private completed = false

  get signal(): AbortSignal {
    return this.controller.signal
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted
  }

  get isCompleted(): boolean {
    return this.completed
  }

  cancel(reason: unknown = new CancellationError()): void {
    if (this.completed || this.isCancelled) return

    this.controller.abort(reason)
    releaseFromBag(this)
  }

  complete(): void {
    if (this.completed) return

    this.completed = true
    releaseFromBag(this)
  }
}
