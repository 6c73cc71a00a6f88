import type { Writable } from "node:stream"
import type { BucketName, Bytes, ObjectKey, ObjectRef } from "./remote-object"

export interface ListPageRequest {
  bucket: BucketName
  prefix: string

  /** Token from the previous page; absent for the first page. */
  continuationToken?: string
}

export interface ListEntry {
  key: ObjectKey
  sizeInBytes: Bytes
  lastModified: Date
  etag?: string
}

export interface ListPage {
  entries: ListEntry[]
  isTruncated: boolean
  nextContinuationToken?: string
}

/**
 * The network side of the cache: paginated listing and single-object download.
 */
export interface ObjectTransport {
  /** Fetch one page of objects whose keys start with `prefix`. */
  listPage(request: ListPageRequest): Promise<ListPage>

  /**
   * Stream the object's bytes into `destination`.
   * Resolves once every byte has been written and `destination` has ended;
   * rejects on any failure.
   */
  download(ref: ObjectRef, destination: Writable): Promise<void>
}
