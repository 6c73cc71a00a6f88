import { resolveCachePath, resolveStoreCacheRoot } from "../cache-path"

describe("cache path resolution", () => {
  it("places each bucket under its own directory", () => {
    expect(resolveStoreCacheRoot("/tmp/cache", "docs")).toBe("/tmp/cache/docs")
    expect(resolveStoreCacheRoot("/tmp/cache", "logs")).toBe("/tmp/cache/logs")
  })

  it("keeps key separators as nested directories", () => {
    const root = resolveStoreCacheRoot("/tmp/cache", "docs")

    expect(resolveCachePath(root, "reports/q1.txt.gz")).toBe("/tmp/cache/docs/reports/q1.txt.gz")
  })

  it("is deterministic for the same inputs", () => {
    const first = resolveCachePath(resolveStoreCacheRoot("/tmp/cache", "docs"), "a/b/c.gz")
    const second = resolveCachePath(resolveStoreCacheRoot("/tmp/cache", "docs"), "a/b/c.gz")

    expect(first).toBe(second)
  })

  it("maps distinct keys to distinct paths", () => {
    const root = resolveStoreCacheRoot("/tmp/cache", "docs")
    const keys = ["a", "a/b", "a/b.gz", "b/a", "a b"]

    const paths = new Set(keys.map((key) => resolveCachePath(root, key)))

    expect(paths.size).toBe(keys.length)
  })
})
