import { BaseError } from "@bucketcache/errors"
import type { OpenMode } from "../ports/cache-handle"
import type { BucketName, ObjectKey } from "../ports/remote-object"

export class ListingError extends BaseError<"listing_failed"> {
  static pageFailed(input: {
    bucket: BucketName
    prefix: string
    continuationToken?: string | undefined
    cause: unknown
  }): ListingError {
    return new ListingError(`Failed to list s3://${input.bucket}/${input.prefix}`, {
      code: "listing_failed",
      context: {
        bucket: input.bucket,
        prefix: input.prefix,
        ...(input.continuationToken !== undefined && {
          continuationToken: input.continuationToken,
        }),
      },
      cause: input.cause,
      isRetryable: true,
    })
  }

  static missingContinuationToken(input: {
    bucket: BucketName
    prefix: string
  }): ListingError {
    return new ListingError(
      `Listing of s3://${input.bucket}/${input.prefix} is truncated but has no continuation token`,
      {
        code: "listing_failed",
        context: { bucket: input.bucket, prefix: input.prefix },
      },
    )
  }
}

export class DownloadError extends BaseError<"download_failed"> {
  static transportFailed(input: {
    bucket: BucketName
    key: ObjectKey
    path: string
    cause: unknown
  }): DownloadError {
    return new DownloadError(`Failed to download s3://${input.bucket}/${input.key}`, {
      code: "download_failed",
      context: { bucket: input.bucket, key: input.key, path: input.path },
      cause: input.cause,
      isRetryable: true,
    })
  }
}

export class CacheIoError extends BaseError<"cache_io_failed"> {
  static streamFailed(input: { path: string; mode: OpenMode; cause: unknown }): CacheIoError {
    return new CacheIoError(`Failed to ${input.mode} cached file ${input.path}`, {
      code: "cache_io_failed",
      context: { path: input.path, mode: input.mode },
      cause: input.cause,
    })
  }

  static pathUnavailable(input: { path: string; cause: unknown }): CacheIoError {
    return new CacheIoError(`Cannot create cached file ${input.path}`, {
      code: "cache_io_failed",
      context: { path: input.path, mode: "write" },
      cause: input.cause,
    })
  }

  static wrongMode(input: { path: string; mode: OpenMode; operation: string }): CacheIoError {
    return new CacheIoError(
      `Cannot ${input.operation} a cached file opened in ${input.mode} mode`,
      {
        code: "cache_io_failed",
        context: { path: input.path, mode: input.mode, operation: input.operation },
        isOperational: false,
      },
    )
  }
}
