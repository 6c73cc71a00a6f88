import type { CacheScope, OpenMode, OpenOptions } from "./cache-handle"
import type { MaterializeResult } from "./materialize-result"
import type { Keyed } from "./remote-object"

/**
 * Local-copy operations, keyed by anything carrying an object key.
 */
export interface CacheOperations {
  /** Deterministic local path of the object's cached copy. */
  cachePath(object: Keyed): string

  /** `true` iff a regular file exists at the cache path. */
  isCached(object: Keyed): Promise<boolean>

  /**
   * Run `fn` with a handle over the decompressed local copy, downloading it
   * first when needed. The file is closed when `fn` settles, whatever the outcome.
   */
  open<R>(object: Keyed, mode: OpenMode, fn: CacheScope<R>, options?: OpenOptions): Promise<R>

  /** Remove the local copy. No-op when absent. */
  clearCached(object: Keyed): Promise<void>

  /** Download the object into the cache, replacing any existing copy. */
  materialize(object: Keyed): Promise<MaterializeResult>
}
