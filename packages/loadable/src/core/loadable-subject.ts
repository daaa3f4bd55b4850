import type { Cancellable } from "../ports/cancellable"
import type { Observer, Subscribable } from "../ports/subscribable"
import { CancelBag } from "./cancel-bag"
import { type LoadableState, loaded, loading, notRequested, valueOf } from "./loadable-state"

export type LoadableSubjectOptions<T> = {
  initial?: LoadableState<T>

  /**
   * Bag of the consuming scope. Each request's bag is stored here, so
   * cancelling the scope cancels whatever this subject is loading.
   * Default: a bag private to the subject.
   */
  scope?: CancelBag
}

/**
 * Observable slot holding a {@link LoadableState}.
 *
 * One request owns the slot at a time: `setLoading` hands it to a new
 * request and cancels the one it replaces, and only the owner may settle it.
 */
export class LoadableSubject<T> implements Subscribable<LoadableState<T>> {
  private state: LoadableState<T>
  private readonly observers = new Set<Observer<LoadableState<T>>>()
  private readonly scope: CancelBag
  private readonly ownsScope: boolean

  constructor(opts: LoadableSubjectOptions<T> = {}) {
    this.state = opts.initial ?? notRequested()
    this.scope = opts.scope ?? new CancelBag()
    this.ownsScope = opts.scope === undefined
  }

  get value(): LoadableState<T> {
    return this.state
  }

  /** Publish `state` to every observer, synchronously. */
  set(state: LoadableState<T>): void {
    const prev = this.state
    this.state = state

    if (prev.kind === "loading" && !(state.kind === "loading" && state.cancelBag === prev.cancelBag)) {
      this.scope.remove(prev.cancelBag)
    }

    for (const observer of [...this.observers]) {
      observer(state)
    }
  }

  /**
   * Enter Loading for a new request owned by `bag`, keeping the current
   * value as `previous`. A request still loading is cancelled.
   */
  setLoading(bag: CancelBag = new CancelBag()): CancelBag {
    const prev = this.state

    if (prev.kind === "loading" && prev.cancelBag !== bag) prev.cancelBag.cancel()

    this.scope.store(bag)
    this.set(loading(valueOf(prev), bag))

    return bag
  }

  /**
   * Publish `state` only if the request owning `bag` still owns the slot.
   * Returns whether it was published.
   */
  settle(bag: CancelBag, state: LoadableState<T>): boolean {
    if (this.state.kind !== "loading" || this.state.cancelBag !== bag || bag.isCancelled) {
      return false
    }

    this.set(state)
    return true
  }

  /**
   * Cancel the pending request and go back to the value it was replacing,
   * or to NotRequested when there was none.
   */
  cancelLoading(): void {
    const current = this.state
    if (current.kind !== "loading") return

    current.cancelBag.cancel()
    this.set(current.previous === undefined ? notRequested() : loaded(current.previous))
  }

  /** Replays the current state to `observer` before returning. */
  subscribe(observer: Observer<LoadableState<T>>): Cancellable {
    this.observers.add(observer)
    observer(this.state)

    return { cancel: () => this.observers.delete(observer) }
  }

  /**
   * Cancel the pending request, drop every observer and, when the scope was
   * not supplied by the caller, cancel the scope too.
   */
  dispose(): void {
    if (this.state.kind === "loading") this.state.cancelBag.cancel()
    if (this.ownsScope) this.scope.cancel()

    this.observers.clear()
  }
}
