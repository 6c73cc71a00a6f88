import { logLevelNames, type LogLevelName } from "@bucketcache/logger"
import { z } from "zod"
import type { DownloadErrorPolicy } from "../ports/materialize-result"

const booleanish = z.union([z.boolean(), z.stringbool()])

/**
 * Flat keys as they appear in the environment, after the `BUCKETCACHE_`
 * prefix is stripped.
 */
export const storeConfigSchema = z.object({
  BUCKET: z.string().min(1),
  CACHE_DIR: z.string().min(1).default("/tmp"),

  S3_REGION: z.string().min(1).default("us-east-1"),
  S3_ENDPOINT: z.string().optional(),
  S3_FORCE_PATH_STYLE: booleanish.default(false),

  ROLE_ARN: z.string().optional(),
  ROLE_SESSION_NAME: z.string().min(1).default("bucketcache"),

  DOWNLOAD_ERROR_POLICY: z.enum(["throw", "ignore"]).default("throw"),
  PROGRESS_VERBOSITY: z.coerce.number().int().min(0).default(3),

  LOG_LEVEL: z.enum(logLevelNames).default("info"),
  LOG_PRETTY: booleanish.default(false),
})

export type StoreConfigInput = z.input<typeof storeConfigSchema>
export type StoreConfigValues = z.output<typeof storeConfigSchema>

export type StoreConfig = {
  bucket: string
  cacheDir: string
  s3: {
    region: string
    endpoint?: string
    forcePathStyle: boolean
  }

  /** Present when credentials come from an assumed role. */
  role?: {
    arn: string
    sessionName: string
  }

  downloads: { onError: DownloadErrorPolicy }
  progress: { verbosity: number }
  logging: { level: LogLevelName; prettify: boolean }
}

export function toStoreConfig(values: StoreConfigValues): StoreConfig {
  return {
    bucket: values.BUCKET,
    cacheDir: values.CACHE_DIR,
    s3: {
      region: values.S3_REGION,
      forcePathStyle: values.S3_FORCE_PATH_STYLE,
      ...(values.S3_ENDPOINT && { endpoint: values.S3_ENDPOINT }),
    },
    ...(values.ROLE_ARN && {
      role: { arn: values.ROLE_ARN, sessionName: values.ROLE_SESSION_NAME },
    }),
    downloads: { onError: values.DOWNLOAD_ERROR_POLICY },
    progress: { verbosity: values.PROGRESS_VERBOSITY },
    logging: { level: values.LOG_LEVEL, prettify: values.LOG_PRETTY },
  }
}
