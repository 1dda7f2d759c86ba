import type { AppError, SerializedError } from "../ports/error"
import { isAppError } from "./utils/is-app-error"

export type SerializeOptions = Readonly<{
  /** Include stack traces. Default: false */
  includeStack?: boolean

  /** Stop following `cause` after this many links. Default: 10 */
  maxCauseDepth?: number
}>

/**
 * Serialize any thrown value to a consistent, JSON-safe shape.
 *
 * AppErrors keep their code and context; plain Errors get code "unknown";
 * non-Error values are wrapped with the value in `context`.
 */
export function serializeError(err: unknown, options?: SerializeOptions): SerializedError {
  return serializeAt(err, options ?? {}, 0)
}

function serializeAt(
  err: unknown,
  options: SerializeOptions,
  depth: number,
): SerializedError {
  const includeStack = options.includeStack ?? false
  const canFollowCause = depth < (options.maxCauseDepth ?? 10)

  if (err instanceof Error) {
    const app: AppError | undefined = isAppError(err) ? err : undefined
    const cause = canFollowCause && err.cause !== undefined ? err.cause : undefined

    return {
      name: err.name,
      code: app?.code ?? "unknown",
      message: err.message,
      context: app ? { ...app.context } : {},
      isOperational: app?.isOperational ?? false,
      isRetryable: app?.isRetryable ?? false,
      timestamp: (app?.timestamp ?? new Date()).toISOString(),
      ...(cause !== undefined && { cause: serializeAt(cause, options, depth + 1) }),
      ...(includeStack && err.stack !== undefined && { stack: err.stack }),
    }
  }

  return {
    name: "NonErrorThrown",
    code: "unknown",
    message: typeof err === "string" ? err : "Unknown error",
    context: typeof err === "string" ? {} : { value: err },
    isOperational: false,
    isRetryable: false,
    timestamp: new Date().toISOString(),
  }
}
