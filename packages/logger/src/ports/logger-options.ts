import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local use. Ignored when the adapter is given an
   * explicit destination stream.
   */
  prettify?: boolean
}
