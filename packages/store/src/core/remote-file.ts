import type { CacheScope, OpenMode, OpenOptions } from "../ports/cache-handle"
import type { MaterializeResult } from "../ports/materialize-result"
import type { CacheOperations } from "../ports/object-cache"
import type { Bytes, ObjectKey, RemoteObject } from "../ports/remote-object"

/**
 * A listed object bound to the store that listed it.
 *
 * @example
 * ```ts
 * const store = createRemoteStore(deps, { bucket: "reports", transform: toRemoteFile })
 * for await (const file of store.list("2024/")) {
 *   const body = await file.open("read", (handle) => handle.text())
 * }
 * ```
 */
export class RemoteFile implements RemoteObject {
  readonly key: ObjectKey
  readonly sizeInBytes: Bytes
  readonly lastModified: Date
  readonly etag?: string

  constructor(
    private readonly cache: CacheOperations,
    object: RemoteObject,
  ) {
    this.key = object.key
    this.sizeInBytes = object.sizeInBytes
    this.lastModified = object.lastModified
    if (object.etag !== undefined) this.etag = object.etag
  }

  get cachePath(): string {
    return this.cache.cachePath(this)
  }

  isCached(): Promise<boolean> {
    return this.cache.isCached(this)
  }

  open<R>(mode: OpenMode, fn: CacheScope<R>, options?: OpenOptions): Promise<R> {
    return this.cache.open(this, mode, fn, options)
  }

  clearCached(): Promise<void> {
    return this.cache.clearCached(this)
  }

  materialize(): Promise<MaterializeResult> {
    return this.cache.materialize(this)
  }

  toString(): string {
    return `RemoteFile(${this.key})`
  }
}

export function toRemoteFile(object: RemoteObject, cache: CacheOperations): RemoteFile {
  return new RemoteFile(cache, object)
}
