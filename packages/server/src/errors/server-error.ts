import { BaseError } from "@catalog/errors"
import type { PhaseResult } from "../lifecycle/lifecycle-hook"

export type ServerErrorCode = "server_already_started" | "startup_failed"

export class ServerError extends BaseError<ServerErrorCode> {
  static alreadyStarted(): ServerError {
    return new ServerError("Server already started", {
      code: "server_already_started",
      isOperational: false,
    })
  }

  static startupFailed(result: PhaseResult): ServerError {
    const failed = result.failures.map((f) => f.hook)
    const first = result.failures[0]

    return new ServerError(
      result.timedOut ? "Startup timed out" : `Startup hook failed: ${failed.join(", ")}`,
      {
        code: "startup_failed",
        context: { failedHooks: failed, timedOut: result.timedOut },
        cause: first?.error,
      },
    )
  }
}
