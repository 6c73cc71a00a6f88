import type { Readable } from "node:stream"

interface Closable {
  readonly closed: boolean
  destroy(): unknown
  once(event: "close", listener: () => void): unknown
}

/**
 * Destroy `stream` and wait until its file descriptor is closed.
 * Resolves immediately for streams that are already closed.
 */
export async function releaseStream(stream: Closable): Promise<void> {
  if (stream.closed) return

  await new Promise<void>((resolve) => {
    stream.once("close", () => resolve())
    stream.destroy()
  })
}

export async function collect(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
  }
  return Buffer.concat(chunks)
}
