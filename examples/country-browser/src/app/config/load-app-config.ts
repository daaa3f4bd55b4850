import { applyOverrides, type ConfigSource, type DeepPartial, DotenvSource, EnvSource, loadConfig } from "@atlas/config"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
      serviceName: env.SERVICE_NAME,
    },
    countries: {
      apiUrl: env.COUNTRIES_API_URL,
      refreshFloorMs: env.COUNTRIES_REFRESH_FLOOR_MS,
      coalesceRequests: env.COUNTRIES_COALESCE_REQUESTS,
    },
    store: {
      driver: env.STORE_DRIVER,
      ...(env.STORE_MAX_ENTRIES !== undefined && { maxEntries: env.STORE_MAX_ENTRIES }),
    },
    redis: {
      url: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
    },
  }
}

/**
 * `.env.<NODE_ENV>` (optional), then `env`, then `overrides`.
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  overrides?: DeepPartial<AppConfig>,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const nodeEnv = env.NODE_ENV ?? "development"

  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${nodeEnv}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  const config = mapEnvToConfig(result.value)

  return overrides ? applyOverrides(config, overrides) : config
}
