import type { Milliseconds } from "@catalog/clock"
import type { Logger } from "@catalog/logger"

export type CleanupTask = (signal: AbortSignal) => Promise<void>

export type CleanupRunnerDeps = {
  logger: Logger
}

export type CleanupRunnerOpts = {
  /** Each task gets a signal that aborts after this long. */
  timeoutMs: Milliseconds
}

/**
 * Runs detached best-effort tasks outside any request. A task never sees the
 * caller's signal, only its own timeout. Failures are logged and dropped.
 */
export class CleanupRunner {
  private readonly inFlight = new Set<Promise<void>>()

  public constructor(
    private readonly deps: CleanupRunnerDeps,
    private readonly opts: CleanupRunnerOpts,
  ) {}

  submit(name: string, task: CleanupTask): void {
    const run = this.execute(name, task).finally(() => {
      this.inFlight.delete(run)
    })

    this.inFlight.add(run)
  }

  pending(): number {
    return this.inFlight.size
  }

  /**
   * Resolves once every task submitted so far has settled.
   *
   * @throws the signal's reason when `signal` aborts first
   */
  async drain(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted()

    const settled = Promise.all(this.inFlight).then(() => undefined)
    if (!signal) return settled

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => reject(signal.reason)
      signal.addEventListener("abort", onAbort, { once: true })

      settled.then(
        () => {
          signal.removeEventListener("abort", onAbort)
          resolve()
        },
        reject,
      )
    })
  }

  private async execute(name: string, task: CleanupTask): Promise<void> {
    try {
      await task(AbortSignal.timeout(this.opts.timeoutMs))
    } catch (err) {
      this.deps.logger.debug("Cleanup task failed", { task: name, err })
    }
  }
}
