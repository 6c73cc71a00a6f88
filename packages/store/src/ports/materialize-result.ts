import type { AppError } from "@bucketcache/errors"

export type DownloadErrorPolicy =
  /** Reject with DownloadError. */
  | "throw"
  /** Report the failure in the result and keep the partial local file. */
  | "ignore"

export type MaterializeResult =
  | { status: "downloaded"; path: string }
  | { status: "failed"; path: string; error: AppError }
