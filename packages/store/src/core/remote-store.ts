import { S3Client, type S3ClientConfig } from "@aws-sdk/client-s3"
import { createNullLogger, type Logger } from "@bucketcache/logger"
import { S3Transport } from "../adapters/s3/s3-transport"
import { NullProgressSink } from "../adapters/progress/null-progress-sink"
import type { CacheScope, OpenMode, OpenOptions } from "../ports/cache-handle"
import type { DownloadErrorPolicy, MaterializeResult } from "../ports/materialize-result"
import type { CacheOperations } from "../ports/object-cache"
import type { ProgressSink } from "../ports/progress-sink"
import type { BucketName, Keyed, RemoteObject } from "../ports/remote-object"
import type { ObjectTransport } from "../ports/transport"
import { resolveStoreCacheRoot } from "./cache-path"
import { ObjectCache } from "./object-cache"
import { ObjectListing, type ObjectTransform } from "./object-listing"
import { RemoteFile } from "./remote-file"

export const DEFAULT_CACHE_DIR = "/tmp"

export type RemoteStoreDeps = {
  /**
   * Transport, or a factory invoked on first network use. Default: an
   * S3Transport over a client built from `options.s3`.
   */
  transport?: ObjectTransport | (() => ObjectTransport)
  progress?: ProgressSink
  logger?: Logger
}

export interface RemoteStoreOptions<T> {
  bucket: BucketName

  /** Cache root is `${cacheDir}/${bucket}`. Default: "/tmp" */
  cacheDir?: string

  transform: ObjectTransform<T>

  /** Default: "throw" */
  onDownloadError?: DownloadErrorPolicy

  /** Client configuration for the default transport. */
  s3?: S3ClientConfig
}

/**
 * Read-through cache over one bucket: enumerate remote objects by prefix and
 * work with local, gzip-encoded copies that are fetched on first use.
 */
export class RemoteStore<T = RemoteObject> implements CacheOperations {
  readonly bucket: BucketName
  readonly cacheRoot: string

  private readonly cache: ObjectCache
  private readonly progress: ProgressSink
  private readonly logger: Logger
  private resolvedTransport: ObjectTransport | undefined

  constructor(
    private readonly deps: RemoteStoreDeps,
    private readonly options: RemoteStoreOptions<T>,
  ) {
    this.bucket = options.bucket
    this.cacheRoot = resolveStoreCacheRoot(options.cacheDir ?? DEFAULT_CACHE_DIR, options.bucket)
    this.progress = deps.progress ?? new NullProgressSink()
    this.logger = (deps.logger ?? createNullLogger()).child({
      component: "remote-store",
      bucket: options.bucket,
    })

    this.cache = new ObjectCache(
      {
        transport: () => this.transport,
        progress: this.progress,
        logger: this.logger.child({ component: "object-cache", cacheDir: this.cacheRoot }),
      },
      {
        bucket: options.bucket,
        cacheRoot: this.cacheRoot,
        onDownloadError: options.onDownloadError ?? "throw",
      },
    )
  }

  /**
   * Enumerate every object whose key starts with `prefix` (everything when
   * empty), one lazily paginated sequence per prefix.
   */
  list(prefix?: string): ObjectListing<T>
  list(prefixes: readonly string[]): ObjectListing<T>[]
  list(prefixes: string | readonly string[] = ""): ObjectListing<T> | ObjectListing<T>[] {
    if (typeof prefixes === "string") return this.listPrefix(prefixes)
    return prefixes.map((prefix) => this.listPrefix(prefix))
  }

  cachePath(object: Keyed): string {
    return this.cache.cachePath(object)
  }

  isCached(object: Keyed): Promise<boolean> {
    return this.cache.isCached(object)
  }

  open<R>(object: Keyed, mode: OpenMode, fn: CacheScope<R>, options?: OpenOptions): Promise<R> {
    return this.cache.open(object, mode, fn, options)
  }

  clearCached(object: Keyed): Promise<void> {
    return this.cache.clearCached(object)
  }

  materialize(object: Keyed): Promise<MaterializeResult> {
    return this.cache.materialize(object)
  }

  file(object: RemoteObject): RemoteFile {
    return new RemoteFile(this, object)
  }

  toString(): string {
    return `RemoteStore(s3://${this.bucket})`
  }

  private listPrefix(prefix: string): ObjectListing<T> {
    return new ObjectListing(
      {
        transport: () => this.transport,
        progress: this.progress,
        logger: this.logger,
        cache: this,
      },
      { bucket: this.bucket, prefix, transform: this.options.transform },
    )
  }

  private get transport(): ObjectTransport {
    if (!this.resolvedTransport) {
      this.resolvedTransport = this.createTransport()
      this.logger.debug("transport ready")
    }
    return this.resolvedTransport
  }

  private createTransport(): ObjectTransport {
    const { transport } = this.deps
    if (typeof transport === "function") return transport()
    if (transport) return transport
    return new S3Transport({ client: new S3Client(this.options.s3 ?? {}) })
  }
}

function identity(object: RemoteObject): RemoteObject {
  return object
}

export type CreateRemoteStoreOptions = Omit<RemoteStoreOptions<RemoteObject>, "transform">

export function createRemoteStore(
  deps: RemoteStoreDeps,
  options: CreateRemoteStoreOptions,
): RemoteStore<RemoteObject>
export function createRemoteStore<T>(
  deps: RemoteStoreDeps,
  options: RemoteStoreOptions<T>,
): RemoteStore<T>
export function createRemoteStore<T>(
  deps: RemoteStoreDeps,
  options: CreateRemoteStoreOptions & { transform?: ObjectTransform<T> },
): RemoteStore<T> | RemoteStore<RemoteObject> {
  const { transform, ...rest } = options
  if (transform) return new RemoteStore<T>(deps, { ...rest, transform })
  return new RemoteStore<RemoteObject>(deps, { ...rest, transform: identity })
}
