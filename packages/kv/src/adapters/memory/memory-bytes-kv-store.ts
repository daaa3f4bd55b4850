import type { Clock, Milliseconds } from "@atlas/clock"
import type {
  BytesKeyValueStore,
  KvEntry,
  KvKey,
  KvResult,
  KvSetOptions,
} from "../../ports/kv-store"
import { KvCapacityError } from "../../ports/kv-errors"

export type MemoryKvStoreOptions = {
  /** Writes of new keys beyond this many live entries throw. */
  maxEntries?: number
}

export type MemoryKvStoreDeps = {
  clock: Clock
}

type MemoryKvStoreEntry = {
  value: Uint8Array
  expiresAtMs?: Milliseconds
}

/**
 * Process-local byte store. Values are copied in and out, so callers cannot
 * alter stored bytes through a reference they hold.
 */
export class MemoryBytesKeyValueStore implements BytesKeyValueStore {
  private readonly store = new Map<KvKey, MemoryKvStoreEntry>()

  constructor(
    private readonly deps: MemoryKvStoreDeps,
    private readonly opts: MemoryKvStoreOptions = {},
  ) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    const entry = this.live(key)
    if (!entry) return { kind: "not_found" }

    return { kind: "found", value: entry.value.slice() }
  }

  async set(key: KvKey, value: Uint8Array, opts?: KvSetOptions): Promise<void> {
    const existing = this.live(key)

    if (!existing) this.ensureCapacity()

    const expiresAtMs =
      opts?.ttlMs !== undefined ? this.deps.clock.nowMs() + opts.ttlMs : existing?.expiresAtMs

    this.store.set(key, {
      value: value.slice(),
      ...(expiresAtMs !== undefined && { expiresAtMs }),
    })
  }

  async delete(key: KvKey): Promise<void> {
    this.store.delete(key)
  }

  async has(key: KvKey): Promise<boolean> {
    return this.live(key) !== undefined
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    const out = new Map<KvKey, KvResult<Uint8Array>>()

    for (const key of keys) {
      out.set(key, await this.get(key))
    }

    return out
  }

  async setMany(entries: readonly KvEntry<Uint8Array>[], opts?: KvSetOptions): Promise<void> {
    for (const [key, value] of entries) {
      await this.set(key, value, opts)
    }
  }

  async deleteMany(keys: readonly KvKey[]): Promise<void> {
    for (const key of keys) {
      this.store.delete(key)
    }
  }

  /** Returns the entry unless it is missing or expired; expired entries are dropped. */
  private live(key: KvKey): MemoryKvStoreEntry | undefined {
    const entry = this.store.get(key)
    if (!entry) return undefined

    if (this.isExpired(entry)) {
      this.store.delete(key)
      return undefined
    }

    return entry
  }

  private ensureCapacity(): void {
    const { maxEntries } = this.opts
    if (maxEntries === undefined) return

    for (const [key, entry] of this.store) {
      if (this.isExpired(entry)) this.store.delete(key)
    }

    if (this.store.size >= maxEntries) throw new KvCapacityError(maxEntries)
  }

  private isExpired(entry: MemoryKvStoreEntry): boolean {
    return entry.expiresAtMs !== undefined && this.deps.clock.nowMs() >= entry.expiresAtMs
  }
}
