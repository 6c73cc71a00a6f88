/**
 * Error codes raised across the workspace.
 *
 * Lowercase snake case so they survive log pipelines that normalize keys.
 */
export type ErrorCode =
  | "listing_failed"
  | "download_failed"
  | "cache_io_failed"
  | "authorization_failed"
  | "invalid_config"
  | "unknown"

/**
 * Structured data attached to an error (bucket, key, prefix, role...).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` if repeating the same call might succeed */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (network, permissions, missing objects),
   * `false` for programmer errors.
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/**
 * JSON-safe shape used by loggers.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
