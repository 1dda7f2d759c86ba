import type { LifecycleHook } from "./lifecycle-hook"
import type { Closeable, ShutdownFn, StopResult } from "./shutdown"
import type { ResolvedServerOptions, ServerDependencies } from "../server/server-options"

export interface ServerHandle {
  stop(): Promise<StopResult>
  address: { host: string; port: number }
}

export interface StopperContext {
  server: Closeable
  port: number

  deps: ServerDependencies
  options: ResolvedServerOptions

  setReady: (value: boolean) => void
  onStop: () => void

  shutdown: ShutdownFn
  stopHooks: readonly LifecycleHook[]
}

/** Repeated `stop()` calls share the first shutdown. */
export function createStopper(ctx: StopperContext): ServerHandle {
  let stopping: Promise<StopResult> | undefined

  return {
    stop: () => {
      stopping ??= runShutdown(ctx)
      return stopping
    },
    address: {
      host: ctx.options.host,
      port: ctx.port,
    },
  }
}

export type CreateStopperFn = typeof createStopper

async function runShutdown(ctx: StopperContext): Promise<StopResult> {
  ctx.setReady(false)

  try {
    return await ctx.shutdown({
      server: ctx.server,
      clock: ctx.deps.clock,
      logger: ctx.deps.logger,
      deadlineMs: ctx.deps.clock.nowMs() + ctx.options.shutdownTimeoutMs,
      stopHooks: ctx.stopHooks,
    })
  } finally {
    ctx.onStop()
  }
}
