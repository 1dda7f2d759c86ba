import type { Milliseconds } from "@catalog/clock"
import type { Logger } from "@catalog/logger"
import type { Application } from "../server/app"
import type { ReadinessCheck, ResolvedHealthConfig } from "../server/server-options"

const NO_CACHE_HEADERS = {
  "Cache-Control": "no-store, no-cache, must-revalidate",
} as const

type CheckResult = { ok: true } | { ok: false; reason: string }

export function registerHealthRoutes(
  app: Application,
  config: ResolvedHealthConfig,
  isReady: () => boolean,
  logger: Logger,
): void {
  if (!config.enabled) return

  app.get(config.livenessPath, (c) => c.json({ ok: true }, { headers: NO_CACHE_HEADERS }))

  app.get(config.readinessPath, async (c) => {
    if (!isReady()) {
      return c.json(
        { ok: false, reason: "starting" },
        { status: 503, headers: NO_CACHE_HEADERS },
      )
    }

    for (const check of config.readinessChecks) {
      const res = await runCheck(check, check.timeoutMs ?? config.checkTimeoutMs, logger)

      if (!res.ok) {
        return c.json(
          { ok: false, reason: res.reason },
          { status: 503, headers: NO_CACHE_HEADERS },
        )
      }
    }

    return c.json({ ok: true }, { headers: NO_CACHE_HEADERS })
  })
}

async function runCheck(
  check: ReadinessCheck,
  timeoutMs: Milliseconds,
  logger: Logger,
): Promise<CheckResult> {
  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)

  // bounded even when the check ignores its signal
  const timedOut = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), {
      once: true,
    })
  })

  try {
    const result = await Promise.race([check.fn(controller.signal), timedOut])

    if (controller.signal.aborted) return { ok: false, reason: `${check.name}:timeout` }

    return result ? { ok: true } : { ok: false, reason: check.name }
  } catch (err) {
    const reason = controller.signal.aborted ? `${check.name}:timeout` : `${check.name}:error`

    logger.warn("Readiness check failed", { check: check.name, reason, err })

    return { ok: false, reason }
  } finally {
    clearTimeout(timer)
  }
}
