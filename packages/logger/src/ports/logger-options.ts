import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Minimum level to emit. */
  level: LogLevelName

  /**
   * Human-readable output for local development. Production keeps JSON lines.
   */
  prettify?: boolean
}
