import type { Clock, UnixMs } from "@catalog/clock"
import type { Logger } from "@catalog/logger"
import type { HookFailure, LifecycleHook } from "./lifecycle-hook"

export type HookPhase = "startup" | "shutdown"

export type RunHooksContext = {
  phase: HookPhase
  clock: Clock
  logger: Logger
  deadlineMs: UnixMs
}

export type RunHooksPolicy = {
  /** Stop after the first failure. Startup uses this. */
  failFast?: boolean
}

type HookAttempt = { failure?: HookFailure; timedOut: boolean }

/**
 * Runs hooks in order, each bounded by what is left of the phase deadline.
 */
export async function runHooks(
  ctx: RunHooksContext,
  hooks: readonly LifecycleHook[],
  policy: RunHooksPolicy = {},
): Promise<{ failures: HookFailure[]; timedOut: boolean }> {
  const failures: HookFailure[] = []

  for (const hook of hooks) {
    const attempt = await runOneHook(ctx, hook)

    if (attempt.failure) {
      failures.push(attempt.failure)
      if (policy.failFast) return { failures, timedOut: attempt.timedOut }
    }

    if (attempt.timedOut) return { failures, timedOut: true }
  }

  return { failures, timedOut: false }
}

async function runOneHook(ctx: RunHooksContext, hook: LifecycleHook): Promise<HookAttempt> {
  const msLeft = Math.max(0, ctx.deadlineMs - ctx.clock.nowMs())

  if (msLeft <= 0) {
    ctx.logger.warn(`Skipping remaining ${ctx.phase} hooks due to timeout`, { hook: hook.name })
    return { timedOut: true }
  }

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), msLeft)

  try {
    await hook.fn({ signal: controller.signal, timeRemainingMs: msLeft })

    if (pastDeadline(ctx, controller)) {
      ctx.logger.warn(`${ctx.phase} deadline exceeded during hook`, { hook: hook.name })
      return { timedOut: true }
    }

    ctx.logger.info(`Executed ${ctx.phase} hook`, { hook: hook.name })
    return { timedOut: false }
  } catch (err) {
    ctx.logger.error(`${ctx.phase} hook failed`, { hook: hook.name, err })

    return { failure: { hook: hook.name, error: err }, timedOut: pastDeadline(ctx, controller) }
  } finally {
    clearTimeout(timer)
  }
}

function pastDeadline(ctx: RunHooksContext, controller: AbortController): boolean {
  return controller.signal.aborted || ctx.clock.nowMs() >= ctx.deadlineMs
}
