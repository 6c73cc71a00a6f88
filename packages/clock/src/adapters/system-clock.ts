import type { Milliseconds, TimeSource } from "../ports/time-source"

export class SystemClock implements TimeSource {
  now(): Date {
    return new Date()
  }

  nowMs(): Milliseconds {
    return Date.now()
  }
}
