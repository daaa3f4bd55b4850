import { type Clock, SystemClock } from "@atlas/clock"
import { createPinoLogger, type Logger } from "@atlas/logger"
import { MemorySingleflight, type Singleflight } from "@atlas/singleflight"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: Clock
  singleflight: Singleflight
}

export function createCoreServices(config: AppConfig): CoreServices {
  const clock = new SystemClock()

  const logger = createPinoLogger(
    {},
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
    },
    { service: config.logging.serviceName, env: config.app.env },
  )

  const singleflight = new MemorySingleflight()

  return { clock, logger, singleflight }
}
