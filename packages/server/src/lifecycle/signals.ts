import type { Logger } from "@catalog/logger"
import type { StopResult } from "./shutdown"

export interface SignalHandlerContext {
  logger: Logger
  stop?: () => Promise<StopResult>
  /** @default 10_000 */
  fatalTimeoutMs?: number
  /** @default process.exit */
  exit?: (code: number) => void
}

export interface SignalHandler {
  unregister: () => void
}

type ResolvedContext = Required<Pick<SignalHandlerContext, "fatalTimeoutMs" | "exit">> &
  SignalHandlerContext

function handleSignal(ctx: ResolvedContext, state: { stopping: boolean }, signal: NodeJS.Signals): void {
  ctx.logger.info("Received signal", { signal })

  if (state.stopping) return
  state.stopping = true

  void gracefulShutdown(ctx, signal)
}

function handleFatal(
  ctx: ResolvedContext,
  state: { stopping: boolean },
  reason: string,
  err: unknown,
): void {
  if (state.stopping) {
    ctx.logger.fatal("Fatal error during shutdown", { reason, err })
    ctx.exit(1)
    return
  }

  state.stopping = true

  void fatalShutdown(ctx, reason, err)
}

async function gracefulShutdown(ctx: ResolvedContext, reason: string): Promise<void> {
  ctx.logger.warn("Shutdown triggered", { reason })

  const ok = await runStop(ctx, reason)

  ctx.exit(ok ? 0 : 1)
}

async function fatalShutdown(ctx: ResolvedContext, reason: string, err: unknown): Promise<void> {
  ctx.logger.fatal("Fatal error", { reason, err })

  const timer = setTimeout(() => {
    ctx.logger.fatal("Forced exit after timeout", { timeoutMs: ctx.fatalTimeoutMs })
    ctx.exit(1)
  }, ctx.fatalTimeoutMs)

  timer.unref()

  try {
    await runStop(ctx, reason)
  } finally {
    clearTimeout(timer)
  }

  ctx.exit(1)
}

async function runStop(ctx: ResolvedContext, reason: string): Promise<boolean> {
  if (!ctx.stop) {
    ctx.logger.warn("No stop handler registered", { reason })
    return true
  }

  try {
    const result = await ctx.stop()

    if (!result.ok) {
      ctx.logger.error("Shutdown completed with issues", {
        reason,
        failureCount: result.failures.length,
        timedOut: result.timedOut,
      })
    }

    return result.ok
  } catch (err) {
    ctx.logger.error("Shutdown failed", { reason, err })
    return false
  }
}

/**
 * Registers SIGINT/SIGTERM for graceful shutdown and turns uncaught errors into
 * a bounded shutdown followed by exit code 1.
 */
export function setupProcessHandlers(ctx: SignalHandlerContext): SignalHandler {
  const resolved: ResolvedContext = {
    ...ctx,
    fatalTimeoutMs: ctx.fatalTimeoutMs ?? 10_000,
    exit: ctx.exit ?? ((code) => process.exit(code)),
  }
  const state = { stopping: false }

  const sigintHandler = () => handleSignal(resolved, state, "SIGINT")
  const sigtermHandler = () => handleSignal(resolved, state, "SIGTERM")
  const uncaughtHandler = (err: Error) => handleFatal(resolved, state, "uncaughtException", err)
  const rejectionHandler = (reason: unknown) =>
    handleFatal(resolved, state, "unhandledRejection", reason)

  process.on("SIGINT", sigintHandler)
  process.on("SIGTERM", sigtermHandler)
  process.on("uncaughtException", uncaughtHandler)
  process.on("unhandledRejection", rejectionHandler)

  return {
    unregister: () => {
      process.off("SIGINT", sigintHandler)
      process.off("SIGTERM", sigtermHandler)
      process.off("uncaughtException", uncaughtHandler)
      process.off("unhandledRejection", rejectionHandler)
    },
  }
}

export type SetupProcessHandlersFn = typeof setupProcessHandlers
