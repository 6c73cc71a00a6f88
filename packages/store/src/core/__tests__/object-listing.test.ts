import { ManualClock } from "@bucketcache/clock"
import { createNullLogger } from "@bucketcache/logger"
import { MemoryTransport } from "../../adapters/memory/memory-transport"
import { MemoryProgressSink } from "../../adapters/progress/memory-progress-sink"
import type { CacheOperations } from "../../ports/object-cache"
import type { RemoteObject } from "../../ports/remote-object"
import type { ListPage, ObjectTransport } from "../../ports/transport"
import { ListingError } from "../errors"
import { ObjectListing, type ObjectTransform } from "../object-listing"

const BUCKET = "docs"

const unusedCache: CacheOperations = {
  cachePath: () => {
    throw new Error("not used")
  },
  isCached: async () => false,
  open: async () => {
    throw new Error("not used")
  },
  clearCached: async () => {},
  materialize: async () => {
    throw new Error("not used")
  },
}

function keyOf(object: RemoteObject): string {
  return object.key
}

describe("ObjectListing", () => {
  let progress: MemoryProgressSink

  function makeListing<T>(
    transport: ObjectTransport,
    prefix: string,
    transform: ObjectTransform<T>,
  ): ObjectListing<T> {
    return new ObjectListing(
      { transport: () => transport, progress, logger: createNullLogger(), cache: unusedCache },
      { bucket: BUCKET, prefix, transform },
    )
  }

  function seed(transport: MemoryTransport, prefix: string, count: number): string[] {
    const keys = Array.from({ length: count }, (_, i) => `${prefix}${String(i).padStart(2, "0")}.gz`)
    for (const key of keys) transport.put({ bucket: BUCKET, key }, "x")
    return keys
  }

  beforeEach(() => {
    progress = new MemoryProgressSink()
  })

  it("follows continuation tokens until the listing is exhausted", async () => {
    const transport = new MemoryTransport({}, { pageSize: 10 })
    const keys = seed(transport, "logs/", 24)
    const listPage = vi.spyOn(transport, "listPage")

    const listing = makeListing(transport, "logs/", keyOf)
    const listed = await listing.toArray()

    expect(listed).toEqual(keys)
    expect(listing.pagesFetched).toBe(3)

    const requests = listPage.mock.calls.map(([request]) => request)
    expect(requests[0]).toEqual({ bucket: BUCKET, prefix: "logs/" })
    expect(requests[1]?.continuationToken).toEqual(expect.any(String))
    expect(requests[2]?.continuationToken).toEqual(expect.any(String))
    expect(requests[1]?.continuationToken).not.toBe(requests[2]?.continuationToken)

    const pages: ListPage[] = await Promise.all(listPage.mock.results.map((result) => result.value))
    expect(pages.map((page) => page.entries.length)).toEqual([10, 10, 4])

    expect(progress.toString()).toBe("...")
  })

  it("fetches nothing until the first item is pulled", async () => {
    const transport = new MemoryTransport({}, { pageSize: 2 })
    seed(transport, "logs/", 5)
    const listPage = vi.spyOn(transport, "listPage")

    const listing = makeListing(transport, "logs/", keyOf)
    expect(listPage).not.toHaveBeenCalled()

    const iterator = listing[Symbol.asyncIterator]()
    await iterator.next()
    await iterator.next()
    expect(listPage).toHaveBeenCalledTimes(1)

    await iterator.next()
    expect(listPage).toHaveBeenCalledTimes(2)
  })

  it("applies the transform to every entry on every page", async () => {
    const transport = new MemoryTransport({}, { pageSize: 2 })
    seed(transport, "logs/", 3)

    const sizes = await makeListing(transport, "logs/", (object) => ({
      name: object.key.toUpperCase(),
      sizeInBytes: object.sizeInBytes,
    })).toArray()

    expect(sizes).toEqual([
      { name: "LOGS/00.GZ", sizeInBytes: 1 },
      { name: "LOGS/01.GZ", sizeInBytes: 1 },
      { name: "LOGS/02.GZ", sizeInBytes: 1 },
    ])
  })

  it("yields frozen descriptors carrying listing metadata", async () => {
    const transport = new MemoryTransport({ clock: new ManualClock(0) })
    transport.put({ bucket: BUCKET, key: "a.gz" }, "abc")

    const [object] = await makeListing(transport, "", (o) => o).toArray()

    expect(object).toMatchObject({ key: "a.gz", sizeInBytes: 3, lastModified: new Date(0) })
    expect(object?.etag).toBe('"900150983cd24fb0d6963f7d28e17f72"')
    expect(Object.isFrozen(object)).toBe(true)
  })

  it("is exhausted after one pass", async () => {
    const transport = new MemoryTransport()
    seed(transport, "logs/", 3)
    const listPage = vi.spyOn(transport, "listPage")

    const listing = makeListing(transport, "logs/", keyOf)

    expect(await listing.toArray()).toHaveLength(3)
    expect(await listing.toArray()).toEqual([])
    expect(listPage).toHaveBeenCalledTimes(1)
  })

  it("yields nothing for an empty prefix match", async () => {
    const transport = new MemoryTransport()
    seed(transport, "logs/", 3)

    expect(await makeListing(transport, "missing/", keyOf).toArray()).toEqual([])
    expect(progress.toString()).toBe(".")
  })

  it("wraps transport failures in ListingError", async () => {
    const transport = new MemoryTransport()
    const cause = new Error("AccessDenied")
    vi.spyOn(transport, "listPage").mockRejectedValue(cause)

    const err = await makeListing(transport, "logs/", keyOf)
      .toArray()
      .catch((caught: unknown) => caught)

    expect(err).toBeInstanceOf(ListingError)
    expect(err).toMatchObject({
      code: "listing_failed",
      context: { bucket: BUCKET, prefix: "logs/" },
      cause,
    })
  })

  it("fails when a truncated page carries no continuation token", async () => {
    const transport = new MemoryTransport()
    vi.spyOn(transport, "listPage").mockResolvedValue({ entries: [], isTruncated: true })

    await expect(makeListing(transport, "logs/", keyOf).toArray()).rejects.toThrow(ListingError)
  })
})
