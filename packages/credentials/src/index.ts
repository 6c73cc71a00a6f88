export {
  type AssumeRoleInput,
  StsCredentialProvider,
  type StsCredentialProviderDeps,
} from "./adapters/sts/sts-credential-provider"
export { STSClient } from "@aws-sdk/client-sts"
export { AuthorizationError } from "./core/authorization-error"
export {
  MemoizedCredentialProvider,
  type MemoizedCredentialProviderDeps,
  type MemoizedCredentialProviderOptions,
} from "./core/memoized-credential-provider"
export type { AwsCredentials, CredentialProvider } from "./ports/credentials"
