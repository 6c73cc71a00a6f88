import { Writable } from "node:stream"
import { ManualClock } from "@bucketcache/clock"
import { MemoryTransport } from "../memory-transport"

function sink() {
  const chunks: Buffer[] = []
  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk)
      callback()
    },
  })

  return { destination, bytes: () => Buffer.concat(chunks) }
}

describe("MemoryTransport (contract)", () => {
  const clock = new ManualClock(new Date("2024-01-15T10:30:00.000Z"))

  it("lists keys under a prefix in key order", async () => {
    const transport = new MemoryTransport({ clock })
    transport.put({ bucket: "docs", key: "b/2" }, "22")
    transport.put({ bucket: "docs", key: "a/1" }, "1")
    transport.put({ bucket: "docs", key: "b/1" }, "1")

    const page = await transport.listPage({ bucket: "docs", prefix: "b/" })

    expect(page.isTruncated).toBe(false)
    expect(page.nextContinuationToken).toBeUndefined()
    expect(page.entries.map((entry) => [entry.key, entry.sizeInBytes])).toEqual([
      ["b/1", 1],
      ["b/2", 2],
    ])
    expect(page.entries[0]?.lastModified).toEqual(new Date("2024-01-15T10:30:00.000Z"))
  })

  it("chains pages through continuation tokens", async () => {
    const transport = new MemoryTransport({ clock }, { pageSize: 2 })
    for (const key of ["k1", "k2", "k3"]) transport.put({ bucket: "docs", key }, key)

    const first = await transport.listPage({ bucket: "docs", prefix: "" })
    expect(first.entries.map((entry) => entry.key)).toEqual(["k1", "k2"])
    expect(first.isTruncated).toBe(true)
    expect(first.nextContinuationToken).toEqual(expect.any(String))

    const second = await transport.listPage({
      bucket: "docs",
      prefix: "",
      continuationToken: first.nextContinuationToken ?? "",
    })
    expect(second.entries.map((entry) => entry.key)).toEqual(["k3"])
    expect(second.isTruncated).toBe(false)
  })

  it("does not report truncation when the last page is exactly full", async () => {
    const transport = new MemoryTransport({ clock }, { pageSize: 2 })
    transport.put({ bucket: "docs", key: "k1" }, "x")
    transport.put({ bucket: "docs", key: "k2" }, "x")

    const page = await transport.listPage({ bucket: "docs", prefix: "" })

    expect(page.isTruncated).toBe(false)
  })

  it("returns an empty page for an unknown bucket", async () => {
    const transport = new MemoryTransport()

    expect(await transport.listPage({ bucket: "nope", prefix: "" })).toEqual({
      entries: [],
      isTruncated: false,
    })
  })

  it("downloads stored bytes and rejects for missing objects", async () => {
    const transport = new MemoryTransport()
    transport.put({ bucket: "docs", key: "a" }, Buffer.from([0, 1, 2]))
    const { destination, bytes } = sink()

    await transport.download({ bucket: "docs", key: "a" }, destination)
    expect([...bytes()]).toEqual([0, 1, 2])

    transport.delete({ bucket: "docs", key: "a" })
    await expect(
      transport.download({ bucket: "docs", key: "a" }, sink().destination),
    ).rejects.toThrow("Object not found: docs/a")
  })
})
