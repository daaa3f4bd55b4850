import type { Codec } from "../../ports/codec"
import type {
  BytesKeyValueStore,
  KeyValueStore,
  KvEntry,
  KvKey,
  KvResult,
  KvSetOptions,
} from "../../ports/kv-store"

export type CodecKeyValueStoreDeps<T> = {
  codec: Codec<T>
  bytesStore: BytesKeyValueStore
}

/**
 * Typed view over a byte store. Decoding errors propagate to the caller.
 */
export class CodecKeyValueStore<T> implements KeyValueStore<T> {
  constructor(private readonly deps: CodecKeyValueStoreDeps<T>) {}

  async get(key: KvKey): Promise<KvResult<T>> {
    return this.decode(await this.deps.bytesStore.get(key))
  }

  async set(key: KvKey, value: T, opts?: KvSetOptions): Promise<void> {
    await this.deps.bytesStore.set(key, this.deps.codec.encode(value), opts)
  }

  async delete(key: KvKey): Promise<void> {
    await this.deps.bytesStore.delete(key)
  }

  async has(key: KvKey): Promise<boolean> {
    return await this.deps.bytesStore.has(key)
  }

  async getMany(keys: readonly KvKey[]): Promise<Map<KvKey, KvResult<T>>> {
    const raw = await this.deps.bytesStore.getMany(keys)
    const out = new Map<KvKey, KvResult<T>>()

    for (const [key, res] of raw) {
      out.set(key, this.decode(res))
    }

    return out
  }

  async setMany(entries: readonly KvEntry<T>[], opts?: KvSetOptions): Promise<void> {
    await this.deps.bytesStore.setMany(
      entries.map(([key, value]) => [key, this.deps.codec.encode(value)] as const),
      opts,
    )
  }

  async deleteMany(keys: readonly KvKey[]): Promise<void> {
    await this.deps.bytesStore.deleteMany(keys)
  }

  private decode(res: KvResult<Uint8Array>): KvResult<T> {
    if (res.kind === "not_found") return res

    return { kind: "found", value: this.deps.codec.decode(res.value) }
  }
}
