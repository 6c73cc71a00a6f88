import { BaseError } from "@bucketcache/errors"

export class AuthorizationError extends BaseError<"authorization_failed"> {
  static roleNotAssumed(input: {
    roleArn: string
    sessionName: string
    cause?: unknown
  }): AuthorizationError {
    return new AuthorizationError(`Could not assume role ${input.roleArn}`, {
      code: "authorization_failed",
      context: { roleArn: input.roleArn, sessionName: input.sessionName },
      ...(input.cause !== undefined && { cause: input.cause }),
    })
  }
}
