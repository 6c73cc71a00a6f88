/**
 * Fields the cache layers attach to their log lines.
 */
export type LogContext = {
  /** Emitting component, e.g. "remote-store" or "object-cache" */
  component: string

  bucket: string
  prefix: string
  key: string

  cacheDir: string
  path: string

  continuationToken: string
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/**
 * Overlay merged into a logger's bindings by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
