import { type Clock, SystemClock } from "@catalog/clock"
import { createPinoLogger, type Logger } from "@catalog/logger"
import type { AppConfig } from "../config"

export type CoreServices = {
  logger: Logger
  clock: Clock
}

export function createCoreServices(config: AppConfig): CoreServices {
  const clock = new SystemClock()

  const logger = createPinoLogger(
    {},
    {
      level: config.logging.level,
      prettify: config.logging.prettify,
    },
    {
      service: config.app.serviceName,
      env: config.app.env,
    },
  )

  return { clock, logger }
}
