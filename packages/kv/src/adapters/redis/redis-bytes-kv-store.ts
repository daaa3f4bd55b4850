import type {
  BytesKeyValueStore,
  KvEntry,
  KvKey,
  KvResult,
  KvSetOptions,
} from "../../ports/kv-store"
import type { RedisBytesClient, RedisSetOptions } from "./redis-client"

export type RedisKvStoreDeps = {
  client: RedisBytesClient
}

export type RedisKvStoreOptions = {
  /**
   * Largest number of keys sent in one command by the bulk methods. Bigger
   * requests are split.
   */
  batchSize: number

  /** Prepended to every key, e.g. `atlas:`. */
  keyspacePrefix: string
}

/**
 * Byte store over Redis strings. The caller owns `connect()` and `quit()`.
 */
export class RedisBytesKeyValueStore implements BytesKeyValueStore {
  constructor(
    private readonly deps: RedisKvStoreDeps,
    private readonly opts: RedisKvStoreOptions,
  ) {}

  async get(key: KvKey): Promise<KvResult<Uint8Array>> {
    return this.toResult(await this.deps.client.get(this.fullKey(key)))
  }

  async set(key: KvKey, value: Uint8Array, opts?: KvSetOptions): Promise<void> {
    await this.deps.client.set(this.fullKey(key), this.toBuffer(value), this.setOptions(opts))
  }

  async delete(key: KvKey): Promise<void> {
    await this.deps.client.del(this.fullKey(key))
  }

  async has(key: KvKey): Promise<boolean> {
    return (await this.deps.client.exists(this.fullKey(key))) === 1
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<Uint8Array>>> {
    const out = new Map<KvKey, KvResult<Uint8Array>>()

    for (const batch of this.chunks(keys)) {
      const buffers = await this.deps.client.mGet(batch.map((k) => this.fullKey(k)))

      for (const [i, key] of batch.entries()) {
        out.set(key, this.toResult(buffers[i] ?? null))
      }
    }

    return out
  }

  async setMany(entries: readonly KvEntry<Uint8Array>[], opts?: KvSetOptions): Promise<void> {
    const setOptions = this.setOptions(opts)

    for (const batch of this.chunks(entries)) {
      const tx = this.deps.client.multi()

      for (const [key, value] of batch) {
        tx.set(this.fullKey(key), this.toBuffer(value), setOptions)
      }

      await tx.exec()
    }
  }

  async deleteMany(keys: readonly KvKey[]): Promise<void> {
    for (const batch of this.chunks(keys)) {
      await this.deps.client.del(batch.map((k) => this.fullKey(k)))
    }
  }

  private *chunks<T>(items: readonly T[]): Generator<T[]> {
    for (let i = 0; i < items.length; i += this.opts.batchSize) {
      yield items.slice(i, i + this.opts.batchSize)
    }
  }

  private setOptions(opts?: KvSetOptions): RedisSetOptions {
    return opts?.ttlMs !== undefined ? { PX: opts.ttlMs } : { KEEPTTL: true }
  }

  private toBuffer(value: Uint8Array): Buffer {
    return Buffer.from(value.buffer, value.byteOffset, value.byteLength)
  }

  private toResult(buffer: Buffer | null): KvResult<Uint8Array> {
    if (buffer === null) return { kind: "not_found" }

    return { kind: "found", value: new Uint8Array(buffer) }
  }

  private fullKey(key: KvKey): string {
    return `${this.opts.keyspacePrefix}${key}`
  }
}
