import type { BucketName, ObjectKey } from "../ports/remote-object"

/**
 * Cache directory of one bucket. Distinct buckets never share a directory
 * under the same `cacheDir`.
 */
export function resolveStoreCacheRoot(cacheDir: string, bucket: BucketName): string {
  return `${cacheDir}/${bucket}`
}

/**
 * Local path of an object's cached copy. Key separators are kept, so
 * "a/b/c.gz" lands in nested directories.
 */
export function resolveCachePath(cacheRoot: string, key: ObjectKey): string {
  return `${cacheRoot}/${key}`
}
