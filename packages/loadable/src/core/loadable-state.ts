import type { CancelBag } from "./cancel-bag"

export type NotRequested = { readonly kind: "not_requested" }

export type Loading<T> = {
  readonly kind: "loading"

  /** Last known value, kept so consumers can go on showing it. */
  readonly previous?: T

  /** Cancels the request that produced this state. */
  readonly cancelBag: CancelBag
}

export type Loaded<T> = { readonly kind: "loaded"; readonly value: T }

export type Failed = { readonly kind: "failed"; readonly error: unknown }

/**
 * Lifecycle of one asynchronously loaded value as a consumer sees it.
 */
export type LoadableState<T> = NotRequested | Loading<T> | Loaded<T> | Failed

export const notRequested = (): NotRequested => ({ kind: "not_requested" })

export const loading = <T>(previous: T | undefined, cancelBag: CancelBag): Loading<T> =>
  previous === undefined ? { kind: "loading", cancelBag } : { kind: "loading", previous, cancelBag }

export const loaded = <T>(value: T): Loaded<T> => ({ kind: "loaded", value })

export const failed = (error: unknown): Failed => ({ kind: "failed", error })

/** The loaded value, or the value a pending load is replacing. */
export function valueOf<T>(state: LoadableState<T>): T | undefined {
  switch (state.kind) {
    case "loaded":
      return state.value
    case "loading":
      return state.previous
    default:
      return undefined
  }
}

export function errorOf<T>(state: LoadableState<T>): unknown {
  return state.kind === "failed" ? state.error : undefined
}

export function isLoading<T>(state: LoadableState<T>): state is Loading<T> {
  return state.kind === "loading"
}

export function mapLoadable<T, U>(state: LoadableState<T>, fn: (value: T) => U): LoadableState<U> {
  switch (state.kind) {
    case "loaded":
      return loaded(fn(state.value))
    case "loading":
      return loading(state.previous === undefined ? undefined : fn(state.previous), state.cancelBag)
    default:
      return state
  }
}
