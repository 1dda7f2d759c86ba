import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

export class FakeClock implements Clock {
  private time: UnixMs

  constructor(start: UnixMs | Date = 0) {
    this.time = start instanceof Date ? start.getTime() : start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): Date {
    this.time += ms
    return this.now()
  }

  set(at: UnixMs | Date): void {
    this.time = at instanceof Date ? at.getTime() : at
  }
}
