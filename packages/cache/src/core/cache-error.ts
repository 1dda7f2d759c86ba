import { BaseError } from "@catalog/errors"
import type { CacheKey } from "../ports/cache-key"

export type CacheErrorCode = "cache_unavailable" | "cache_decode_failed"

export class CacheError extends BaseError<CacheErrorCode> {
  static unavailable(operation: string, cause: unknown): CacheError {
    return new CacheError(`Cache ${operation} failed`, {
      code: "cache_unavailable",
      context: { operation },
      cause,
      isRetryable: true,
    })
  }

  static decodeFailed(key: CacheKey, cause: unknown): CacheError {
    return new CacheError("Cached value could not be decoded", {
      code: "cache_decode_failed",
      context: { key },
      cause,
    })
  }
}
