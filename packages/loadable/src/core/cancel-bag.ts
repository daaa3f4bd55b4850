import { BaseError } from "@atlas/errors"
import type { Cancellable } from "../ports/cancellable"

export class CancelBagOwnershipError extends BaseError<"cancel_bag_ownership"> {
  constructor() {
    super("Cancellable already belongs to another CancelBag", {
      code: "cancel_bag_ownership",
      isOperational: false,
    })
  }
}

const owners = new WeakMap<Cancellable, CancelBag>()

/**
 * Detach `member` from whichever bag holds it. Used by members that finish or
 * cancel on their own, so bags do not hold on to dead work.
 */
export function releaseFromBag(member: Cancellable): void {
  owners.get(member)?.remove(member)
}

/**
 * Owns a set of in-flight operations and cancels them together.
 *
 * A member belongs to at most one bag at a time. Bags are themselves
 * cancellable, so a pipeline's bag can be stored in the bag of the scope
 * that consumes it. All mutation is synchronous, so members settling from
 * callbacks can never interleave with `cancel()`.
 */
export class CancelBag implements Cancellable {
  private readonly members = new Set<Cancellable>()
  private cancelled = false

  get isCancelled(): boolean {
    return this.cancelled
  }

  get size(): number {
    return this.members.size
  }

  has(member: Cancellable): boolean {
    return this.members.has(member)
  }

  /**
   * Add `member`. Storing into a cancelled bag cancels `member` right away.
   *
   * @throws CancelBagOwnershipError when `member` is held by a different bag
   */
  store(member: Cancellable): void {
    if (member === this) throw new CancelBagOwnershipError()

    const owner = owners.get(member)
    if (owner !== undefined && owner !== this) throw new CancelBagOwnershipError()

    if (this.cancelled) {
      member.cancel()
      return
    }

    this.members.add(member)
    owners.set(member, this)
  }

  /** Stop tracking `member` without cancelling it. */
  remove(member: Cancellable): void {
    if (!this.members.delete(member)) return

    owners.delete(member)
  }

  /**
   * Cancel every member once, then empty the bag. Later calls do nothing.
   */
  cancel(): void {
    if (this.cancelled) return
    this.cancelled = true

    const members = [...this.members]
    this.members.clear()

    for (const member of members) {
      owners.delete(member)
      member.cancel()
    }

    releaseFromBag(this)
  }
}
