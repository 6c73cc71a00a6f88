import { S3Client } from "@aws-sdk/client-s3"
import type { CredentialProvider } from "@bucketcache/credentials"

export interface CreateS3ClientOptions {
  region: string

  /** Custom endpoint for S3-compatible services, e.g. "http://localhost:9000" */
  endpoint?: string
  forcePathStyle?: boolean

  /** Default: the SDK's provider chain */
  credentials?: CredentialProvider
}

export function createS3Client(options: CreateS3ClientOptions): S3Client {
  const { credentials } = options

  return new S3Client({
    region: options.region,
    ...(options.endpoint && { endpoint: options.endpoint }),
    ...(options.forcePathStyle && { forcePathStyle: true }),
    ...(credentials && { credentials: () => credentials.getCredentials() }),
  })
}
