import type { RemoteObject } from "../ports/remote-object"
import type { ListEntry } from "../ports/transport"

export function createRemoteObject(entry: ListEntry): RemoteObject {
  return Object.freeze({
    key: entry.key,
    sizeInBytes: entry.sizeInBytes,
    lastModified: new Date(entry.lastModified.getTime()),
    ...(entry.etag !== undefined && { etag: entry.etag }),
  })
}
