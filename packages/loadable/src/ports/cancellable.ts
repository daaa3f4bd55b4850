/**
 * Something in flight that can be told to stop. Calling `cancel()` more than
 * once, or after the work finished, has no effect.
 */
export interface Cancellable {
  cancel(): void
}
