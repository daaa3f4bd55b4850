import { BaseError } from "@atlas/errors"

export class KvCapacityError extends BaseError<"kv_capacity_exceeded"> {
  constructor(maxEntries: number) {
    super(`Key-value store is full (${maxEntries} entries)`, {
      code: "kv_capacity_exceeded",
      context: { maxEntries },
    })
  }
}
