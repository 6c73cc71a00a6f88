import type { Milliseconds, TimeSource } from "../ports/time-source"

/**
 * Time that only moves when told to. For tests of expiry and timestamps.
 */
export class ManualClock implements TimeSource {
  private time: Milliseconds

  constructor(start: Milliseconds | Date = 0) {
    this.time = typeof start === "number" ? start : start.getTime()
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): Milliseconds {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time += ms
  }

  set(ms: Milliseconds): void {
    this.time = ms
  }
}
