import { EnvSource } from "../../adapters/env/env-source"
import { ObjectSource } from "../../adapters/object/object-source"
import { ConfigError } from "../config-error"
import { loadStoreConfig } from "../load-store-config"

describe("loadStoreConfig", () => {
  it("applies defaults around the required bucket", async () => {
    const config = await loadStoreConfig({ sources: [new ObjectSource({ BUCKET: "docs" })] })

    expect(config).toEqual({
      bucket: "docs",
      cacheDir: "/tmp",
      s3: { region: "us-east-1", forcePathStyle: false },
      downloads: { onError: "throw" },
      progress: { verbosity: 3 },
      logging: { level: "info", prettify: false },
    })
  })

  it("reads prefixed environment variables and coerces their values", async () => {
    const env = {
      BUCKETCACHE_BUCKET: "docs",
      BUCKETCACHE_CACHE_DIR: "/var/cache/bucketcache",
      BUCKETCACHE_S3_REGION: "eu-west-1",
      BUCKETCACHE_S3_ENDPOINT: "http://localhost:9000",
      BUCKETCACHE_S3_FORCE_PATH_STYLE: "true",
      BUCKETCACHE_ROLE_ARN: "arn:aws:iam::000000000000:role/cache-reader",
      BUCKETCACHE_DOWNLOAD_ERROR_POLICY: "ignore",
      BUCKETCACHE_PROGRESS_VERBOSITY: "0",
      BUCKETCACHE_LOG_LEVEL: "debug",
      BUCKETCACHE_LOG_PRETTY: "false",
      UNRELATED: "ignored",
    }

    const config = await loadStoreConfig({
      sources: [new EnvSource({ env, prefix: "BUCKETCACHE_" })],
    })

    expect(config).toEqual({
      bucket: "docs",
      cacheDir: "/var/cache/bucketcache",
      s3: { region: "eu-west-1", endpoint: "http://localhost:9000", forcePathStyle: true },
      role: { arn: "arn:aws:iam::000000000000:role/cache-reader", sessionName: "bucketcache" },
      downloads: { onError: "ignore" },
      progress: { verbosity: 0 },
      logging: { level: "debug", prettify: false },
    })
  })

  it("lets later sources override earlier ones and skips undefined values", async () => {
    const config = await loadStoreConfig({
      sources: [
        new ObjectSource({ BUCKET: "docs", CACHE_DIR: "/data" }),
        new ObjectSource({ BUCKET: "logs", CACHE_DIR: undefined }),
      ],
    })

    expect(config.bucket).toBe("logs")
    expect(config.cacheDir).toBe("/data")
  })

  it("raises ConfigError naming the invalid keys", async () => {
    const err = await loadStoreConfig({
      sources: [new ObjectSource({ DOWNLOAD_ERROR_POLICY: "retry" })],
    }).catch((caught: unknown) => caught)

    expect(err).toBeInstanceOf(ConfigError)
    expect(err).toMatchObject({ code: "invalid_config", context: { sources: ["object"] } })
    expect(err instanceof Error && err.message).toContain("BUCKET")
    expect(err instanceof Error && err.message).toContain("DOWNLOAD_ERROR_POLICY")
  })
})

describe("EnvSource", () => {
  it("returns every variable when no prefix is set", async () => {
    const source = new EnvSource({ env: { A: "1", B: undefined } })

    expect(await source.load()).toEqual({ A: "1", B: undefined })
  })

  it("strips the prefix and drops other variables", async () => {
    const source = new EnvSource({ env: { APP_A: "1", B: "2" }, prefix: "APP_" })

    expect(await source.load()).toEqual({ A: "1" })
  })
})
