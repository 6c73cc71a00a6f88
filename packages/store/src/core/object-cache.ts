import * as fs from "node:fs/promises"
import * as path from "node:path"
import type { Logger } from "@bucketcache/logger"
import type { CacheScope, OpenMode, OpenOptions } from "../ports/cache-handle"
import type { DownloadErrorPolicy, MaterializeResult } from "../ports/materialize-result"
import type { CacheOperations } from "../ports/object-cache"
import { type ProgressSink, ProgressMarkers } from "../ports/progress-sink"
import type { BucketName, Keyed, ObjectKey } from "../ports/remote-object"
import type { ObjectTransport } from "../ports/transport"
import { withGunzipReader, withGzipWriter } from "./cache-handles"
import { resolveCachePath } from "./cache-path"
import { CacheIoError, DownloadError } from "./errors"
import { isNotFoundError } from "./fs-errors"
import { releaseStream } from "./release-stream"

export interface ObjectCacheDeps {
  /** Called on first download; lets the owner create its connection lazily. */
  transport: () => ObjectTransport
  progress: ProgressSink
  logger: Logger
}

export interface ObjectCacheOptions {
  bucket: BucketName
  cacheRoot: string
  onDownloadError: DownloadErrorPolicy
}

/**
 * Local, gzip-encoded copies of one bucket's objects under `cacheRoot`.
 *
 * There is no coherency check: once a copy exists it is served until
 * `clearCached` removes it. Concurrent downloads of the same key through one
 * cache share a single transfer.
 */
export class ObjectCache implements CacheOperations {
  private readonly downloads = new Map<ObjectKey, Promise<MaterializeResult>>()

  constructor(
    private readonly deps: ObjectCacheDeps,
    readonly options: ObjectCacheOptions,
  ) {}

  cachePath(object: Keyed): string {
    return resolveCachePath(this.options.cacheRoot, object.key)
  }

  async isCached(object: Keyed): Promise<boolean> {
    try {
      const stat = await fs.stat(this.cachePath(object))
      return stat.isFile()
    } catch (err) {
      if (isNotFoundError(err)) return false
      throw err
    }
  }

  async open<R>(
    object: Keyed,
    mode: OpenMode,
    fn: CacheScope<R>,
    options: OpenOptions = {},
  ): Promise<R> {
    const filePath = this.cachePath(object)

    if (mode === "write") {
      await fs.mkdir(path.dirname(filePath), { recursive: true })
    } else {
      await this.ensureLocal(object)
    }

    if (mode === "read") {
      return withGunzipReader(filePath, fn, options, this.deps.logger)
    }
    return withGzipWriter(filePath, mode, fn, options)
  }

  async clearCached(object: Keyed): Promise<void> {
    if (!(await this.isCached(object))) return

    const filePath = this.cachePath(object)
    try {
      await fs.unlink(filePath)
    } catch (err) {
      if (!isNotFoundError(err)) throw err
      return
    }
    this.deps.logger.info("cleared cached copy", { key: object.key, path: filePath })
  }

  materialize(object: Keyed): Promise<MaterializeResult> {
    const inFlight = this.downloads.get(object.key)
    if (inFlight) return inFlight

    const download = this.download(object.key).finally(() => {
      if (this.downloads.get(object.key) === download) {
        this.downloads.delete(object.key)
      }
    })
    this.downloads.set(object.key, download)
    return download
  }

  private async ensureLocal(object: Keyed): Promise<void> {
    const cached = await this.isCached(object)

    // The file exists as soon as a download starts, so an in-flight download
    // takes precedence over what the stat saw.
    const inFlight = this.downloads.get(object.key)
    if (inFlight) {
      await inFlight
      return
    }

    if (!cached) await this.materialize(object)
  }

  private async download(key: ObjectKey): Promise<MaterializeResult> {
    const filePath = resolveCachePath(this.options.cacheRoot, key)
    const { bucket } = this.options

    let file: fs.FileHandle
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true })
      file = await fs.open(filePath, "w")
    } catch (err) {
      // No file to continue over, so the ignore policy does not apply.
      const error = CacheIoError.pathUnavailable({ path: filePath, cause: err })
      this.deps.progress.write(ProgressMarkers.DownloadFailed)
      this.deps.logger.warn("download failed", { key, path: filePath, err: error })
      throw error
    }
    const destination = file.createWriteStream()

    this.deps.progress.write(ProgressMarkers.RoundTrip)
    this.deps.logger.debug("downloading object", { key, path: filePath })
    const startedAt = Date.now()

    let failure: { error: unknown } | undefined
    try {
      await this.deps.transport().download({ bucket, key }, destination)
    } catch (err) {
      failure = { error: err }
    } finally {
      await releaseStream(destination)
    }

    if (!failure) {
      this.deps.logger.debug("downloaded object", {
        key,
        path: filePath,
        durationMs: Date.now() - startedAt,
      })
      return { status: "downloaded", path: filePath }
    }

    const error = DownloadError.transportFailed({
      bucket,
      key,
      path: filePath,
      cause: failure.error,
    })
    this.deps.progress.write(ProgressMarkers.DownloadFailed)
    this.deps.logger.warn("download failed", { key, path: filePath, err: error })

    if (this.options.onDownloadError === "ignore") {
      return { status: "failed", path: filePath, error }
    }

    // A partial copy would otherwise be served as a cache hit.
    await fs.rm(filePath, { force: true })
    throw error
  }
}
