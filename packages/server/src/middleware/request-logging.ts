import type { Logger } from "@catalog/logger"
import { routePath } from "hono/route"
import type { Middleware } from "../server/app"
import type { PathString, RequestLoggingSettings } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/**
 * One "Request completed" line per request: 5xx at `error`, everything else at
 * `config.level`.
 */
export function requestLoggingMiddleware(
  config: RequestLoggingSettings,
  baseLogger: Logger,
): Middleware {
  return async (c, next) => {
    const path = c.req.path

    if (shouldIgnore(path, config.ignorePaths)) {
      await next()
      return
    }

    const start = performance.now()

    try {
      await next()
    } finally {
      const status = c.res.status
      const durationMs = Math.round(performance.now() - start)
      const method = c.req.method
      const matched = routePath(c)
      const route = isNonEmptyString(matched) && matched !== "/*" ? matched : path
      const userAgent = c.req.header("user-agent")

      const meta = {
        requestId: c.get("requestId") ?? "unknown",
        method,
        path,
        route,
        op: `${method} ${route}`,
        status,
        durationMs,
        ...(userAgent !== undefined && { userAgent }),
      }

      const logger = c.get("logger") ?? baseLogger

      logger[status >= 500 ? "error" : config.level]("Request completed", meta)
    }
  }
}

function shouldIgnore(path: string, ignorePaths: readonly PathString[]): boolean {
  return ignorePaths.some((ignored) => path === ignored || path.startsWith(`${ignored}/`))
}
