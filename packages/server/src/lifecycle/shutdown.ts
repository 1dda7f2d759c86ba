import type { Clock, UnixMs } from "@catalog/clock"
import type { Logger } from "@catalog/logger"
import type { LifecycleHook, PhaseResult } from "./lifecycle-hook"
import { runHooks } from "./run-hooks"

export interface Closeable {
  close: (callback?: (err?: Error) => void) => unknown
}

export type StopResult = PhaseResult

export type ShutdownContext = {
  server: Closeable
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
  stopHooks: readonly LifecycleHook[]
}

/**
 * Closes the HTTP server, then runs every stop hook even if some fail.
 * `timedOut` means something was skipped or abandoned at the deadline;
 * open sockets are not force-closed.
 */
export async function shutdown(ctx: ShutdownContext): Promise<StopResult> {
  ctx.logger.warn("Shutting down gracefully")

  const { failures, timedOut } = await runHooks(
    { phase: "shutdown", clock: ctx.clock, logger: ctx.logger, deadlineMs: ctx.deadlineMs },
    [closeServerHook(ctx.server), ...ctx.stopHooks],
    { failFast: false },
  )

  ctx.logger.info("Shutdown complete", { failureCount: failures.length, timedOut })

  return { ok: failures.length === 0 && !timedOut, failures, timedOut }
}

export type ShutdownFn = typeof shutdown

function closeServerHook(server: Closeable): LifecycleHook {
  return {
    name: "server.close",
    fn: ({ signal }) =>
      new Promise<void>((resolve, reject) => {
        if (signal.aborted) return resolve()

        const onAbort = () => resolve()
        signal.addEventListener("abort", onAbort, { once: true })

        server.close((err) => {
          signal.removeEventListener("abort", onAbort)
          if (err) reject(err)
          else resolve()
        })
      }),
  }
}
