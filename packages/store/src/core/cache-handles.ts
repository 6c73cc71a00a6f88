import { createReadStream, createWriteStream } from "node:fs"
import type { Readable } from "node:stream"
import { pipeline } from "node:stream/promises"
import { createGunzip, createGzip, type Gunzip, type Gzip } from "node:zlib"
import type { Logger } from "@bucketcache/logger"
import type { CacheHandle, CacheScope, OpenOptions } from "../ports/cache-handle"
import { CacheIoError } from "./errors"
import { collect, releaseStream } from "./release-stream"

const DEFAULT_ENCODING: BufferEncoding = "utf8"

class GunzipReadHandle implements CacheHandle {
  readonly mode = "read"

  constructor(
    readonly path: string,
    readonly stream: Gunzip,
    private readonly encoding: BufferEncoding,
  ) {}

  async bytes(): Promise<Buffer> {
    try {
      return await collect(this.stream)
    } catch (err) {
      throw CacheIoError.streamFailed({ path: this.path, mode: this.mode, cause: err })
    }
  }

  async text(): Promise<string> {
    return (await this.bytes()).toString(this.encoding)
  }

  async write(_chunk: string | Uint8Array): Promise<void> {
    throw CacheIoError.wrongMode({ path: this.path, mode: this.mode, operation: "write" })
  }
}

class GzipWriteHandle implements CacheHandle {
  constructor(
    readonly path: string,
    readonly mode: "write" | "append",
    private readonly gzip: Gzip,
    private readonly encoding: BufferEncoding,
  ) {}

  get stream(): Readable {
    throw CacheIoError.wrongMode({ path: this.path, mode: this.mode, operation: "stream" })
  }

  async bytes(): Promise<Buffer> {
    throw CacheIoError.wrongMode({ path: this.path, mode: this.mode, operation: "read" })
  }

  async text(): Promise<string> {
    throw CacheIoError.wrongMode({ path: this.path, mode: this.mode, operation: "read" })
  }

  write(chunk: string | Uint8Array): Promise<void> {
    const data = typeof chunk === "string" ? Buffer.from(chunk, this.encoding) : chunk

    return new Promise((resolve, reject) => {
      this.gzip.write(data, (err) => (err ? reject(err) : resolve()))
    })
  }
}

/**
 * Run `fn` over the gunzipped content of `path`. Both the file and the
 * decompressor are destroyed when `fn` settles.
 */
export async function withGunzipReader<R>(
  path: string,
  fn: CacheScope<R>,
  options: OpenOptions,
  logger: Logger,
): Promise<R> {
  const file = createReadStream(path)
  const gunzip = createGunzip()

  // Consumers see errors through the handle; this listener keeps an unread
  // handle from raising them as uncaught.
  let streamError: unknown
  gunzip.on("error", (err) => {
    streamError = err
  })
  file.on("error", (err) => gunzip.destroy(err))
  file.pipe(gunzip)

  try {
    return await fn(new GunzipReadHandle(path, gunzip, options.encoding ?? DEFAULT_ENCODING))
  } finally {
    if (streamError !== undefined) {
      logger.debug("cached file stream failed", { path, err: streamError })
    }
    await Promise.all([releaseStream(gunzip), releaseStream(file)])
  }
}

/**
 * Run `fn` with a handle that gzips what it is given into `path`, as a new
 * member appended to the existing content in "append" mode. The member is
 * flushed and the file closed before the returned promise resolves.
 */
export async function withGzipWriter<R>(
  path: string,
  mode: "write" | "append",
  fn: CacheScope<R>,
  options: OpenOptions,
): Promise<R> {
  const file = createWriteStream(path, { flags: mode === "append" ? "a" : "w" })
  const gzip = createGzip()

  let streamError: unknown
  const piped = pipeline(gzip, file).catch((err: unknown) => {
    streamError = err
  })

  let result: R
  try {
    result = await fn(new GzipWriteHandle(path, mode, gzip, options.encoding ?? DEFAULT_ENCODING))
  } catch (err) {
    gzip.destroy()
    await piped
    await releaseStream(file)
    throw err
  }

  gzip.end()
  await piped
  await releaseStream(file)

  if (streamError !== undefined) {
    throw CacheIoError.streamFailed({ path, mode, cause: streamError })
  }

  return result
}
