import { createRedisClient, type RedisBytesClient } from "@atlas/kv"
import type { AppConfig } from "../config"

export type InfraClients = {
  /** Only created for the `redis` store driver. Not connected until start. */
  redisClient: RedisBytesClient | null
}

export function createDefaultInfraClients(config: AppConfig): InfraClients {
  const redisClient =
    config.store.driver === "redis" ? createRedisClient({ url: config.redis.url }) : null

  return { redisClient }
}
