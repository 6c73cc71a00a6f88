export type Bytes = number

/**
 * Unique identifier for an object within a bucket.
 * Path-like keys ("reports/2024/q1.txt.gz") map to nested cache directories.
 */
export type ObjectKey = string

/**
 * Name of the remote container (an S3 bucket).
 */
export type BucketName = string

export interface ObjectRef {
  bucket: BucketName
  key: ObjectKey
}

/**
 * Anything the cache can be asked about: a descriptor or a caller's own
 * listing result, as long as it carries the object key.
 */
export interface Keyed {
  readonly key: ObjectKey
}

/**
 * Listed object's identity and metadata at enumeration time.
 * Instances produced by the store are frozen.
 */
export interface RemoteObject extends Keyed {
  readonly sizeInBytes: Bytes
  readonly lastModified: Date

  /** Content fingerprint for display and debugging; never used for coherency. */
  readonly etag?: string
}
