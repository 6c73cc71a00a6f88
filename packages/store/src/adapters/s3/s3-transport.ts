import { Readable, type Writable } from "node:stream"
import { pipeline } from "node:stream/promises"
import {
  type _Object,
  GetObjectCommand,
  ListObjectsV2Command,
  type S3Client,
} from "@aws-sdk/client-s3"
import { SystemClock, type TimeSource } from "@bucketcache/clock"
import type { ObjectRef } from "../../ports/remote-object"
import type { ListEntry, ListPage, ListPageRequest, ObjectTransport } from "../../ports/transport"

export interface S3TransportDeps {
  client: S3Client
  clock?: TimeSource
}

export interface S3TransportOptions {
  /** Keys per listing page. S3 caps this at 1000, which is also its default. */
  pageSize?: number
}

export class S3Transport implements ObjectTransport {
  private readonly clock: TimeSource

  constructor(
    readonly deps: S3TransportDeps,
    readonly options: S3TransportOptions = {},
  ) {
    this.clock = deps.clock ?? new SystemClock()
  }

  async listPage(request: ListPageRequest): Promise<ListPage> {
    const response = await this.deps.client.send(
      new ListObjectsV2Command({
        Bucket: request.bucket,
        ...(request.prefix && { Prefix: request.prefix }),
        ...(request.continuationToken && { ContinuationToken: request.continuationToken }),
        ...(this.options.pageSize && { MaxKeys: this.options.pageSize }),
      }),
    )

    return {
      entries: this.mapListContents(response.Contents),
      isTruncated: response.IsTruncated ?? false,
      ...(response.NextContinuationToken && {
        nextContinuationToken: response.NextContinuationToken,
      }),
    }
  }

  async download(ref: ObjectRef, destination: Writable): Promise<void> {
    const response = await this.deps.client.send(
      new GetObjectCommand({
        Bucket: ref.bucket,
        Key: ref.key,
      }),
    )

    const body = response.Body
    if (!(body instanceof Readable)) {
      throw new Error(`GetObject returned no readable body for s3://${ref.bucket}/${ref.key}`)
    }

    await pipeline(body, destination)
  }

  private mapListContents(contents: _Object[] | undefined): ListEntry[] {
    if (!contents) return []

    return contents
      .filter((obj): obj is _Object & { Key: string } => Boolean(obj.Key))
      .map((obj) => ({
        key: obj.Key,
        sizeInBytes: obj.Size ?? 0,
        lastModified: obj.LastModified ?? this.clock.now(),
        ...(obj.ETag && { etag: obj.ETag }),
      }))
  }
}
