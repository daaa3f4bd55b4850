import type { Clock } from "@atlas/clock"
import { createClient, RESP_TYPES, type RedisClientOptions } from "redis"
import {
  MemoryBytesKeyValueStore,
  type MemoryKvStoreOptions,
} from "./adapters/memory/memory-bytes-kv-store"
import {
  RedisBytesKeyValueStore,
  type RedisKvStoreOptions,
} from "./adapters/redis/redis-bytes-kv-store"
import type { RedisBytesClient } from "./adapters/redis/redis-client"
import { CodecKeyValueStore } from "./core/codec/codec-kv-store"
import type { Codec } from "./ports/codec"
import type { KeyValueStore } from "./ports/kv-store"

export type RedisBytesClientOptions = { url: string } & Omit<RedisClientOptions, "url">

/**
 * node-redis client whose blob replies come back as `Buffer`. Not connected.
 */
export function createRedisClient(options: RedisBytesClientOptions): RedisBytesClient {
  return createClient(options).withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}

export function createMemoryKeyValueStore<T>(options: {
  clock: Clock
  codec: Codec<T>
  opts?: MemoryKvStoreOptions
}): KeyValueStore<T> {
  return new CodecKeyValueStore<T>({
    bytesStore: new MemoryBytesKeyValueStore({ clock: options.clock }, options.opts),
    codec: options.codec,
  })
}

export function createRedisKeyValueStore<T>(options: {
  client: RedisBytesClient
  codec: Codec<T>
  opts: RedisKvStoreOptions
}): KeyValueStore<T> {
  return new CodecKeyValueStore<T>({
    bytesStore: new RedisBytesKeyValueStore({ client: options.client }, options.opts),
    codec: options.codec,
  })
}
