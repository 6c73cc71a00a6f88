import { createHash } from "node:crypto"
import { Readable, type Writable } from "node:stream"
import { pipeline } from "node:stream/promises"
import { SystemClock, type TimeSource } from "@bucketcache/clock"
import type { BucketName, ObjectKey, ObjectRef } from "../../ports/remote-object"
import type { ListEntry, ListPage, ListPageRequest, ObjectTransport } from "../../ports/transport"

const DEFAULT_PAGE_SIZE = 1000

interface StoredObject {
  data: Buffer
  lastModified: Date
}

export interface MemoryTransportDeps {
  clock?: TimeSource
}

export interface MemoryTransportOptions {
  /** Keys per listing page. Default: 1000 */
  pageSize?: number
}

/**
 * In-process transport for tests and local runs. Listing pages are ordered
 * by key and chained by an opaque token naming the last key served.
 */
export class MemoryTransport implements ObjectTransport {
  private readonly buckets = new Map<BucketName, Map<ObjectKey, StoredObject>>()
  private readonly clock: TimeSource
  private readonly pageSize: number

  constructor(deps: MemoryTransportDeps = {}, options: MemoryTransportOptions = {}) {
    this.clock = deps.clock ?? new SystemClock()
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE
  }

  put(ref: ObjectRef, data: Buffer | Uint8Array | string): void {
    this.getOrCreateBucket(ref.bucket).set(ref.key, {
      data: Buffer.from(data),
      lastModified: this.clock.now(),
    })
  }

  delete(ref: ObjectRef): void {
    this.buckets.get(ref.bucket)?.delete(ref.key)
  }

  async listPage(request: ListPageRequest): Promise<ListPage> {
    const bucketMap = this.buckets.get(request.bucket)
    if (!bucketMap) return { entries: [], isTruncated: false }

    const after = request.continuationToken
      ? this.decodeToken(request.continuationToken)
      : undefined

    const keys = Array.from(bucketMap.keys())
      .filter((key) => key.startsWith(request.prefix))
      .filter((key) => after === undefined || key > after)
      .sort()

    const pageKeys = keys.slice(0, this.pageSize)
    const entries: ListEntry[] = []
    for (const key of pageKeys) {
      const stored = bucketMap.get(key)
      if (stored) entries.push(this.toListEntry(key, stored))
    }

    const lastKey = pageKeys.at(-1)
    const isTruncated = keys.length > pageKeys.length && lastKey !== undefined

    return {
      entries,
      isTruncated,
      ...(isTruncated && lastKey !== undefined && { nextContinuationToken: this.encodeToken(lastKey) }),
    }
  }

  async download(ref: ObjectRef, destination: Writable): Promise<void> {
    const stored = this.buckets.get(ref.bucket)?.get(ref.key)
    if (!stored) {
      throw new Error(`Object not found: ${ref.bucket}/${ref.key}`)
    }

    await pipeline(Readable.from([Buffer.from(stored.data)]), destination)
  }

  private getOrCreateBucket(bucket: BucketName): Map<ObjectKey, StoredObject> {
    let bucketMap = this.buckets.get(bucket)
    if (!bucketMap) {
      bucketMap = new Map()
      this.buckets.set(bucket, bucketMap)
    }
    return bucketMap
  }

  private toListEntry(key: ObjectKey, stored: StoredObject): ListEntry {
    return {
      key,
      sizeInBytes: stored.data.length,
      lastModified: stored.lastModified,
      etag: `"${createHash("md5").update(stored.data).digest("hex")}"`,
    }
  }

  private encodeToken(key: ObjectKey): string {
    return Buffer.from(key, "utf8").toString("base64url")
  }

  private decodeToken(token: string): ObjectKey {
    return Buffer.from(token, "base64url").toString("utf8")
  }
}
