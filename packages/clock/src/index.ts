export { ManualClock } from "./adapters/manual-clock"
export { SystemClock } from "./adapters/system-clock"
export type { Milliseconds, TimeSource } from "./ports/time-source"
