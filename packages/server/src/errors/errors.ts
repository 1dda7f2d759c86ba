import { type AppError, type ErrorCode, isAppError } from "@catalog/errors"
import type { StatusCode } from "../http/status-codes"

export type ErrorMapping = {
  status: StatusCode

  /**
   * User-facing message.
   *
   * @remarks
   * Must not expose internal details.
   */
  message: string
}

export type FallbackMapping = ErrorMapping & {
  code: ErrorCode
}

export type ErrorContextTransformer = (
  error: AppError,
) => Record<string, unknown> | undefined

export interface ErrorMappingsConfig {
  /**
   * Error code to status and message. Unmapped codes are not exposed.
   */
  mappings: Partial<Record<ErrorCode, ErrorMapping>>

  fallback?: FallbackMapping

  /**
   * Extra fields merged into the response body. Return undefined to add none.
   */
  transformContext?: ErrorContextTransformer
}

export type ErrorResponseBody = {
  status: StatusCode
  code: ErrorCode
  message: string
  requestId: string
  [key: string]: unknown
}

export type ErrorResponse = {
  error: ErrorResponseBody
}

export type ErrorFormatter = (error: unknown, requestId: string) => ErrorResponse

export const DEFAULT_FALLBACK: FallbackMapping = {
  code: "internal_error",
  status: 500,
  message: "An unexpected error occurred",
}

/**
 * Maps errors to response bodies.
 *
 * @remarks
 * - Mapped `AppError`s use their configured status and message
 * - Unmapped `AppError`s and anything else use the fallback entirely
 * - `transformContext` only sees `AppError`s
 */
export function createErrorFormatter(config: ErrorMappingsConfig): ErrorFormatter {
  const fallback = config.fallback ?? DEFAULT_FALLBACK

  return (error: unknown, requestId: string): ErrorResponse => {
    if (isAppError(error)) {
      const mapping = config.mappings[error.code]
      const extra = config.transformContext?.(error)

      return {
        error: {
          ...extra,
          code: mapping ? error.code : fallback.code,
          status: mapping?.status ?? fallback.status,
          message: mapping?.message ?? fallback.message,
          requestId,
        },
      }
    }

    return {
      error: {
        code: fallback.code,
        status: fallback.status,
        message: fallback.message,
        requestId,
      },
    }
  }
}
