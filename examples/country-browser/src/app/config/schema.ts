import type { Milliseconds } from "@atlas/clock"
import { type LogLevelName, logLevelNames } from "@atlas/logger"
import { z } from "zod"

export const storeDrivers = ["memory", "redis"] as const
export type StoreDriver = (typeof storeDrivers)[number]

export const envSchema = z.object({
  APP_ENV: z.string().default("development"),
  SERVICE_NAME: z.string().default("Country Browser"),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: z.stringbool().default(false),

  COUNTRIES_API_URL: z.url().default("https://restcountries.com/v2"),
  COUNTRIES_REFRESH_FLOOR_MS: z.coerce.number().int().min(0).default(500),
  COUNTRIES_COALESCE_REQUESTS: z.stringbool().default(true),

  STORE_DRIVER: z.enum(storeDrivers).default("memory"),
  STORE_MAX_ENTRIES: z.coerce.number().int().positive().optional(),

  REDIS_URL: z.string().default("redis://localhost:6379"),
  REDIS_KEY_PREFIX: z.string().default("app:country-browser"),
})

export type EnvConfig = z.infer<typeof envSchema>

export type AppConfig = {
  app: {
    env: string
  }

  logging: {
    level: LogLevelName
    prettify: boolean
    serviceName: string
  }

  countries: {
    apiUrl: string
    refreshFloorMs: Milliseconds
    coalesceRequests: boolean
  }

  store: {
    driver: StoreDriver
    maxEntries?: number
  }

  redis: {
    url: string
    keyPrefix: string
  }
}
