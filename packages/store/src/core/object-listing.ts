import type { Logger } from "@bucketcache/logger"
import type { CacheOperations } from "../ports/object-cache"
import { type ProgressSink, ProgressMarkers } from "../ports/progress-sink"
import type { BucketName, RemoteObject } from "../ports/remote-object"
import type { ListPage, ObjectTransport } from "../ports/transport"
import { ListingError } from "./errors"
import { createRemoteObject } from "./remote-object"

/**
 * Maps each listed descriptor to what the listing yields. Receives the
 * store's cache operations so results can be bound to it (see RemoteFile).
 */
export type ObjectTransform<T> = (object: RemoteObject, cache: CacheOperations) => T

export interface ObjectListingDeps {
  transport: () => ObjectTransport
  progress: ProgressSink
  logger: Logger
  cache: CacheOperations
}

export interface ObjectListingOptions<T> {
  bucket: BucketName
  prefix: string
  transform: ObjectTransform<T>
}

/**
 * Lazy, single-pass enumeration of every object under one prefix.
 *
 * Pages are fetched on demand as the consumer pulls; nothing is requested
 * until the first item is. Iterating a second time, or again after breaking
 * out, yields nothing more.
 */
export class ObjectListing<T> implements AsyncIterable<T> {
  private readonly iterator: AsyncGenerator<T, void, undefined>
  private pages = 0

  constructor(
    private readonly deps: ObjectListingDeps,
    private readonly options: ObjectListingOptions<T>,
  ) {
    this.iterator = this.generate()
  }

  get prefix(): string {
    return this.options.prefix
  }

  /** Round trips made so far. */
  get pagesFetched(): number {
    return this.pages
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this.iterator
  }

  async toArray(): Promise<T[]> {
    const items: T[] = []
    for await (const item of this) items.push(item)
    return items
  }

  private async *generate(): AsyncGenerator<T, void, undefined> {
    const { bucket, prefix, transform } = this.options
    let continuationToken: string | undefined

    for (;;) {
      const page = await this.fetchPage(continuationToken)

      for (const entry of page.entries) {
        yield transform(createRemoteObject(entry), this.deps.cache)
      }

      if (!page.isTruncated) return
      if (!page.nextContinuationToken) {
        throw ListingError.missingContinuationToken({ bucket, prefix })
      }
      continuationToken = page.nextContinuationToken
    }
  }

  private async fetchPage(continuationToken: string | undefined): Promise<ListPage> {
    const { bucket, prefix } = this.options

    this.deps.progress.write(ProgressMarkers.RoundTrip)
    this.deps.logger.debug("listing page", {
      prefix,
      ...(continuationToken !== undefined && { continuationToken }),
    })

    let page: ListPage
    try {
      page = await this.deps.transport().listPage({
        bucket,
        prefix,
        ...(continuationToken !== undefined && { continuationToken }),
      })
    } catch (err) {
      const error = ListingError.pageFailed({ bucket, prefix, continuationToken, cause: err })
      this.deps.logger.warn("listing failed", { prefix, err: error })
      throw error
    }

    this.pages++
    return page
  }
}
