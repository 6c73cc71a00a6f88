export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export {
  MemoryTransport,
  type MemoryTransportDeps,
  type MemoryTransportOptions,
} from "./adapters/memory/memory-transport"
export { ObjectSource } from "./adapters/object/object-source"
export { MemoryProgressSink } from "./adapters/progress/memory-progress-sink"
export { NullProgressSink } from "./adapters/progress/null-progress-sink"
export {
  StreamProgressSink,
  type StreamProgressSinkDeps,
  type StreamProgressSinkOptions,
} from "./adapters/progress/stream-progress-sink"
export { type CreateS3ClientOptions, createS3Client } from "./adapters/s3/create-s3-client"
export {
  S3Transport,
  type S3TransportDeps,
  type S3TransportOptions,
} from "./adapters/s3/s3-transport"
export { ConfigError } from "./config/config-error"
export {
  type CreateStoreFromConfigDeps,
  createStoreFromConfig,
} from "./config/create-store-from-config"
export {
  ENV_PREFIX,
  type LoadStoreConfigOptions,
  loadStoreConfig,
} from "./config/load-store-config"
export {
  type StoreConfig,
  type StoreConfigInput,
  storeConfigSchema,
} from "./config/store-config"
export { resolveCachePath, resolveStoreCacheRoot } from "./core/cache-path"
export { CacheIoError, DownloadError, ListingError } from "./core/errors"
export {
  ObjectListing,
  type ObjectTransform,
} from "./core/object-listing"
export { RemoteFile, toRemoteFile } from "./core/remote-file"
export { createRemoteObject } from "./core/remote-object"
export {
  type CreateRemoteStoreOptions,
  createRemoteStore,
  DEFAULT_CACHE_DIR,
  RemoteStore,
  type RemoteStoreDeps,
  type RemoteStoreOptions,
} from "./core/remote-store"
export type {
  CacheHandle,
  CacheScope,
  OpenMode,
  OpenOptions,
} from "./ports/cache-handle"
export type { ConfigSource } from "./ports/config-source"
export type { DownloadErrorPolicy, MaterializeResult } from "./ports/materialize-result"
export type { CacheOperations } from "./ports/object-cache"
export { type ProgressSink, ProgressMarkers } from "./ports/progress-sink"
export type {
  BucketName,
  Bytes,
  Keyed,
  ObjectKey,
  ObjectRef,
  RemoteObject,
} from "./ports/remote-object"
export type {
  ListEntry,
  ListPage,
  ListPageRequest,
  ObjectTransport,
} from "./ports/transport"
