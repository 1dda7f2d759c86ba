import type { UnixMs } from "./time"

export type Clock = {
  /**
   * Current time as a Date. A fresh instance on every call, so callers may
   * keep it without aliasing the clock's state.
   */
  now(): Date

  nowMs(): UnixMs
}
