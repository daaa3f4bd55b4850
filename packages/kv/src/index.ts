export {
  MemoryBytesKeyValueStore,
  type MemoryKvStoreOptions,
} from "./adapters/memory/memory-bytes-kv-store"
export {
  RedisBytesKeyValueStore,
  type RedisKvStoreOptions,
} from "./adapters/redis/redis-bytes-kv-store"
export type { RedisBytesClient } from "./adapters/redis/redis-client"
export { CodecKeyValueStore } from "./core/codec/codec-kv-store"
export {
  createMemoryKeyValueStore,
  createRedisClient,
  createRedisKeyValueStore,
  type RedisBytesClientOptions,
} from "./create"
export type { Codec } from "./ports/codec"
export { KvCapacityError } from "./ports/kv-errors"
export type {
  BytesKeyValueStore,
  KeyValueStore,
  KvEntry,
  KvKey,
  KvResult,
  KvSetOptions,
} from "./ports/kv-store"
