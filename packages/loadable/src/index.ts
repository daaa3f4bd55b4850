export { CancelBag, CancelBagOwnershipError, releaseFromBag } from "./core/cancel-bag"
export { CancellationHandle } from "./core/cancellation-handle"
export { ensureTimeSpan, type TimeSpanOptions } from "./core/ensure-time-span"
export { LazyList, type LazyListOptions } from "./core/lazy-list"
export { type LoadIntoDeps, type LoadTask, loadInto } from "./core/load-into"
export {
  errorOf,
  type Failed,
  failed,
  isLoading,
  type Loaded,
  type LoadableState,
  type Loading,
  loaded,
  loading,
  mapLoadable,
  type NotRequested,
  notRequested,
  valueOf,
} from "./core/loadable-state"
export { LoadableSubject, type LoadableSubjectOptions } from "./core/loadable-subject"
export { type WeakAssignOptions, type WeakRefLike, weakAssign } from "./core/weak-assign"
export type { Cancellable } from "./ports/cancellable"
export type { Observer, Subscribable } from "./ports/subscribable"
