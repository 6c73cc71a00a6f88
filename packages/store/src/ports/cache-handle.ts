import type { Readable } from "node:stream"

/**
 * - "read": materializes on a miss, then gunzips the local copy
 * - "write": creates or truncates the local copy, no download
 * - "append": materializes on a miss, then appends a new gzip member
 */
export type OpenMode = "read" | "write" | "append"

export interface OpenOptions {
  /** Encoding for `text()` and string writes. Default: "utf8" */
  encoding?: BufferEncoding
}

/**
 * Scoped view over a cached file, valid only inside the `open` callback.
 *
 * Like a file object, operations that do not match `mode` fail with
 * CacheIoError (reading from a write handle, writing to a read handle).
 */
export interface CacheHandle {
  readonly mode: OpenMode
  readonly path: string

  /** Decompressed content. Read mode only. */
  readonly stream: Readable

  /**
   * Whole decompressed content. Read mode only. A truncated or corrupt file
   * rejects with CacheIoError.
   */
  bytes(): Promise<Buffer>
  text(): Promise<string>

  /** Compress and append `chunk`. Write and append modes only. */
  write(chunk: string | Uint8Array): Promise<void>
}

export type CacheScope<R> = (handle: CacheHandle) => Promise<R> | R
