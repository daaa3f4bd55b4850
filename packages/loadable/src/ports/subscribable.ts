import type { Cancellable } from "./cancellable"

export type Observer<T> = (value: T) => void

/**
 * Minimal push source. The returned handle stops delivery.
 */
export interface Subscribable<T> {
  subscribe(observer: Observer<T>): Cancellable
}
