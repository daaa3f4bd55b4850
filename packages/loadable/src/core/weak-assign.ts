import type { Cancellable } from "../ports/cancellable"
import type { Subscribable } from "../ports/subscribable"

export type WeakRefLike<T extends object> = {
  deref(): T | undefined
}

export type WeakAssignOptions = {
  /** Default: `new WeakRef(target)` */
  makeRef?: <T extends object>(target: T) => WeakRefLike<T>
}

/**
 * Copy every value `source` emits into `target[key]` without keeping
 * `target` alive. Once `target` has been collected the subscription ends on
 * the next emission.
 */
export function weakAssign<Target extends object, K extends keyof Target>(
  source: Subscribable<Target[K]>,
  target: Target,
  key: K,
  opts: WeakAssignOptions = {},
): Cancellable {
  const ref = opts.makeRef ? opts.makeRef(target) : new WeakRef(target)

  let subscription: Cancellable | undefined
  let stopped = false

  const stop = () => {
    stopped = true
    subscription?.cancel()
  }

  subscription = source.subscribe((value) => {
    const live = ref.deref()

    if (live === undefined) {
      stop()
      return
    }

    live[key] = value
  })

  if (stopped) subscription.cancel()

  return { cancel: stop }
}
