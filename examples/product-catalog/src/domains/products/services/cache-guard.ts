import type { Logger, LogMeta } from "@catalog/logger"

export type Guarded<T> = { kind: "ok"; value: T } | { kind: "degraded" }

export type CacheGuardDeps = {
  logger: Logger
}

/**
 * Runs cache calls so that a failure becomes `degraded` instead of an error.
 * Every degraded call logs one warning.
 */
export class CacheGuard {
  public constructor(private readonly deps: CacheGuardDeps) {}

  async call<T>(op: string, fn: () => Promise<T>, meta: LogMeta = {}): Promise<Guarded<T>> {
    try {
      return { kind: "ok", value: await fn() }
    } catch (err) {
      this.deps.logger.warn("Cache degraded", { ...meta, op, err })
      return { kind: "degraded" }
    }
  }
}
