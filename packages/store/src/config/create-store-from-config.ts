import type { S3Client } from "@aws-sdk/client-s3"
import {
  type CredentialProvider,
  MemoizedCredentialProvider,
  StsCredentialProvider,
  STSClient,
} from "@bucketcache/credentials"
import { createPinoLogger, type Logger } from "@bucketcache/logger"
import { StreamProgressSink } from "../adapters/progress/stream-progress-sink"
import { createS3Client } from "../adapters/s3/create-s3-client"
import { S3Transport } from "../adapters/s3/s3-transport"
import type { RemoteObject } from "../ports/remote-object"
import { createRemoteStore, type RemoteStore } from "../core/remote-store"
import type { StoreConfig } from "./store-config"

export type CreateStoreFromConfigDeps = {
  /** Replaces the client built from `config.s3` and `config.role`. */
  s3Client?: S3Client
  stsClient?: STSClient
  logger?: Logger

  /** Progress destination. Default: process.stderr */
  progressStream?: NodeJS.WritableStream
}

/**
 * Build a store from loaded configuration. No client is created and no
 * credential is requested until the store first touches the network.
 */
export function createStoreFromConfig(
  config: StoreConfig,
  deps: CreateStoreFromConfigDeps = {},
): RemoteStore<RemoteObject> {
  const logger = deps.logger ?? createPinoLogger({}, config.logging)

  return createRemoteStore(
    {
      transport: () =>
        new S3Transport({ client: deps.s3Client ?? buildS3Client(config, deps, logger) }),
      progress: new StreamProgressSink(
        { ...(deps.progressStream && { stream: deps.progressStream }) },
        { verbosity: config.progress.verbosity },
      ),
      logger,
    },
    {
      bucket: config.bucket,
      cacheDir: config.cacheDir,
      onDownloadError: config.downloads.onError,
    },
  )
}

function buildS3Client(
  config: StoreConfig,
  deps: CreateStoreFromConfigDeps,
  logger: Logger,
): S3Client {
  let credentials: CredentialProvider | undefined
  if (config.role) {
    logger.debug("using assumed-role credentials", { roleArn: config.role.arn })
    credentials = new MemoizedCredentialProvider({
      source: new StsCredentialProvider(
        { client: deps.stsClient ?? new STSClient({ region: config.s3.region }) },
        { roleArn: config.role.arn, sessionName: config.role.sessionName },
      ),
    })
  }

  return createS3Client({
    region: config.s3.region,
    ...(config.s3.endpoint && { endpoint: config.s3.endpoint }),
    forcePathStyle: config.s3.forcePathStyle,
    ...(credentials && { credentials }),
  })
}
