/**
 * Short-lived access credentials for the object store.
 */
export interface AwsCredentials {
  accessKeyId: string
  secretAccessKey: string
  sessionToken: string

  /** Absent when the issuer did not report one; such credentials never expire locally. */
  expiration?: Date
}

export interface CredentialProvider {
  getCredentials(): Promise<AwsCredentials>
}
