import { ProductError } from "../model/product.errors"

const UNIQUE_VIOLATION = "23505"

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EPIPE",
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
])

// pg raises these without a code
const CONNECTION_MESSAGES = [
  "Connection terminated",
  "timeout exceeded when trying to connect",
]

function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined

  return typeof err.code === "string" ? err.code : undefined
}

export function isUniqueViolation(err: unknown): boolean {
  return errorCode(err) === UNIQUE_VIOLATION
}

export function isConnectionError(err: unknown): boolean {
  const code = errorCode(err)
  if (code !== undefined) return CONNECTION_CODES.has(code) || code.startsWith("08")

  return err instanceof Error && CONNECTION_MESSAGES.some((m) => err.message.includes(m))
}

/**
 * Wraps a driver error. Product errors and aborts pass through unchanged.
 */
export function toStoreError(operation: string, err: unknown): unknown {
  if (err instanceof ProductError) return err
  if (err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError")) {
    return err
  }

  return isConnectionError(err)
    ? ProductError.storeUnavailable(operation, err)
    : ProductError.storeFailure(operation, err)
}
