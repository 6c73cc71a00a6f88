import { SystemClock, type TimeSource } from "@bucketcache/clock"
import type { AwsCredentials, CredentialProvider } from "../ports/credentials"

const DEFAULT_REFRESH_MARGIN_MS = 60_000

export type MemoizedCredentialProviderDeps = {
  source: CredentialProvider
  clock?: TimeSource
}

export interface MemoizedCredentialProviderOptions {
  /** Refresh this long before `expiration`. */
  refreshMarginMs?: number
}

/**
 * Reuses credentials from `source` until they are within `refreshMarginMs`
 * of expiring. Concurrent callers share a single refresh.
 */
export class MemoizedCredentialProvider implements CredentialProvider {
  private cached: AwsCredentials | undefined
  private inFlight: Promise<AwsCredentials> | undefined
  private readonly clock: TimeSource
  private readonly refreshMarginMs: number

  constructor(
    private readonly deps: MemoizedCredentialProviderDeps,
    options: MemoizedCredentialProviderOptions = {},
  ) {
    this.clock = deps.clock ?? new SystemClock()
    this.refreshMarginMs = options.refreshMarginMs ?? DEFAULT_REFRESH_MARGIN_MS
  }

  async getCredentials(): Promise<AwsCredentials> {
    if (this.cached && !this.isExpiring(this.cached)) return this.cached

    if (this.inFlight) return this.inFlight

    const flight = this.deps.source.getCredentials()
    this.inFlight = flight

    try {
      const creds = await flight
      this.cached = creds
      return creds
    } finally {
      if (this.inFlight === flight) this.inFlight = undefined
    }
  }

  /** Drop cached credentials so the next call refreshes. */
  invalidate(): void {
    this.cached = undefined
  }

  private isExpiring(creds: AwsCredentials): boolean {
    if (!creds.expiration) return false

    return this.clock.nowMs() >= creds.expiration.getTime() - this.refreshMarginMs
  }
}
