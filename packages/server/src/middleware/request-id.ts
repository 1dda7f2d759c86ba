import type { Context } from "hono"
import type { Middleware } from "../server/app"
import type { RequestIdSettings } from "../server/server-options"
import { isNonEmptyString } from "./utils/is-non-empty-string"
import { setHeaderIfMissing } from "./utils/set-header-if-missing"

/** Longer inbound ids are replaced rather than trusted. */
const MAX_REQUEST_ID_LENGTH = 128

function resolveRequestId(c: Context, config: RequestIdSettings): string {
  const existing = c.get("requestId")
  if (isNonEmptyString(existing)) return existing

  const fromHeader = c.req.header(config.header)
  if (isNonEmptyString(fromHeader) && fromHeader.length <= MAX_REQUEST_ID_LENGTH) {
    return fromHeader.trim()
  }

  return config.generate()
}

/**
 * Attaches a request id to the context and mirrors it onto the response.
 */
export function requestIdMiddleware(config: RequestIdSettings): Middleware {
  return async (c, next) => {
    const requestId = resolveRequestId(c, config)

    c.set("requestId", requestId)

    await next()

    setHeaderIfMissing(c.res.headers, config.header.toLowerCase(), requestId)
  }
}
