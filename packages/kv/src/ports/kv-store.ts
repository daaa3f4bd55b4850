import type { Milliseconds } from "@atlas/clock"

/** Namespaced string such as `countries:list`. */
export type KvKey = string

export type KvEntry<T> = readonly [KvKey, T]

export type KvResult<T> =
  | { readonly kind: "found"; readonly value: T }
  | { readonly kind: "not_found" }

export type KvSetOptions = {
  /** Entry expires this long after the write. Without it, an existing TTL is kept. */
  readonly ttlMs?: Milliseconds
}

/**
 * Authoritative key-value storage. A miss means the key does not exist.
 */
export interface KeyValueStore<T> {
  get(key: KvKey): Promise<KvResult<T>>

  /** Overwrites any existing value. */
  set(key: KvKey, value: T, opts?: KvSetOptions): Promise<void>

  /** Deleting a missing key is a no-op. */
  delete(key: KvKey): Promise<void>

  has(key: KvKey): Promise<boolean>

  /** One result per distinct key. */
  getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<T>>>

  /** Duplicate keys: last write wins. Atomicity depends on the backend. */
  setMany(entries: readonly KvEntry<T>[], opts?: KvSetOptions): Promise<void>

  deleteMany(keys: readonly KvKey[]): Promise<void>
}

export type BytesKeyValueStore = KeyValueStore<Uint8Array>
