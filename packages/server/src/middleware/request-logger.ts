import type { Logger } from "@catalog/logger"
import type { Middleware } from "../server/app"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/** Binds a request-scoped child logger to the context. */
export function requestLoggerMiddleware(baseLogger: Logger): Middleware {
  return async (c, next) => {
    if (!c.get("logger")) {
      const requestId = c.get("requestId")
      const bindings = isNonEmptyString(requestId) ? { requestId } : {}

      c.set("logger", baseLogger.child(bindings))
    }

    await next()
  }
}
