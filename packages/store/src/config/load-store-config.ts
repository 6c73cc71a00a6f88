import { z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { ConfigSource } from "../ports/config-source"
import { ConfigError } from "./config-error"
import { type StoreConfig, storeConfigSchema, toStoreConfig } from "./store-config"

export const ENV_PREFIX = "BUCKETCACHE_"

export type LoadStoreConfigOptions = {
  /** Default: the environment, keys prefixed with "BUCKETCACHE_" */
  sources?: ConfigSource[]
}

/**
 * @example
 * ```ts
 * // BUCKETCACHE_BUCKET=reports BUCKETCACHE_CACHE_DIR=/var/cache
 * const config = await loadStoreConfig()
 * const store = createStoreFromConfig(config)
 * ```
 */
export async function loadStoreConfig(options: LoadStoreConfigOptions = {}): Promise<StoreConfig> {
  const sources = options.sources ?? [new EnvSource({ prefix: ENV_PREFIX })]
  const merged: Record<string, unknown> = {}

  for (const source of sources) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = storeConfigSchema.safeParse(merged)

  if (!result.success) {
    throw ConfigError.validationFailed({
      details: z.prettifyError(result.error),
      sources: sources.map((source) => source.name),
    })
  }

  return toStoreConfig(result.data)
}
