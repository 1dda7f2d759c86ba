import type { ErrorCode } from "@catalog/errors"
import type { Logger } from "@catalog/logger"
import type { ErrorHandler as HonoErrorHandler } from "hono"
import { routePath } from "hono/route"
import type { StatusCode } from "../http/status-codes"
import { isNonEmptyString } from "../middleware/utils/is-non-empty-string"
import { createErrorFormatter, type ErrorMappingsConfig } from "./errors"

export type ErrorHandler = HonoErrorHandler

/**
 * Formats thrown errors with `mappings` and logs each failed request once.
 */
export function createErrorHandler(mappings: ErrorMappingsConfig, baseLogger: Logger): ErrorHandler {
  const formatter = createErrorFormatter(mappings)

  return (err, c) => {
    const requestId = c.get("requestId") ?? "unknown"
    const response = formatter(err, requestId)

    const matched = routePath(c)
    const route = isNonEmptyString(matched) && matched !== "/*" ? matched : c.req.path

    logError(c.get("logger") ?? baseLogger, err, {
      requestId,
      method: c.req.method,
      route,
      status: response.error.status,
      code: response.error.code,
    })

    return c.json(response, response.error.status)
  }
}

export type CreateErrorHandlerFn = typeof createErrorHandler

type ErrorLogMeta = {
  requestId: string
  method: string
  route: string
  status: StatusCode
  code: ErrorCode
}

/**
 * - 5xx => error with `err`
 * - 4xx => warn without `err`, debug with `err`
 */
function logError(logger: Logger, err: unknown, meta: ErrorLogMeta): void {
  const base = { ...meta, op: `${meta.method} ${meta.route}` }

  if (meta.status >= 500) {
    logger.error("Request failed", { ...base, err })
    return
  }

  logger.warn("Request failed", base)
  logger.debug("Request failed details", { ...base, err })
}
