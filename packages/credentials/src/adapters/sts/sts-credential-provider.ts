import {
  AssumeRoleCommand,
  type AssumeRoleCommandOutput,
  type STSClient,
} from "@aws-sdk/client-sts"
import { AuthorizationError } from "../../core/authorization-error"
import type { AwsCredentials, CredentialProvider } from "../../ports/credentials"

export interface AssumeRoleInput {
  roleArn: string
  sessionName: string
  durationSeconds?: number
}

export type StsCredentialProviderDeps = {
  client: STSClient
}

/**
 * Exchanges a role ARN for temporary credentials.
 *
 * Every call goes to STS. Wrap in {@link MemoizedCredentialProvider} to reuse
 * credentials until they are about to expire.
 */
export class StsCredentialProvider implements CredentialProvider {
  constructor(
    private readonly deps: StsCredentialProviderDeps,
    private readonly role: AssumeRoleInput,
  ) {}

  getCredentials(): Promise<AwsCredentials> {
    return this.assumeRole(this.role)
  }

  async assumeRole(input: AssumeRoleInput): Promise<AwsCredentials> {
    let response: AssumeRoleCommandOutput
    try {
      response = await this.deps.client.send(
        new AssumeRoleCommand({
          RoleArn: input.roleArn,
          RoleSessionName: input.sessionName,
          ...(input.durationSeconds !== undefined && {
            DurationSeconds: input.durationSeconds,
          }),
        }),
      )
    } catch (err) {
      throw AuthorizationError.roleNotAssumed({ ...input, cause: err })
    }

    const creds = response.Credentials
    if (!creds?.AccessKeyId || !creds.SecretAccessKey || !creds.SessionToken) {
      throw AuthorizationError.roleNotAssumed(input)
    }

    return {
      accessKeyId: creds.AccessKeyId,
      secretAccessKey: creds.SecretAccessKey,
      sessionToken: creds.SessionToken,
      ...(creds.Expiration && { expiration: creds.Expiration }),
    }
  }
}
