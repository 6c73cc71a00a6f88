/**
 * Missing path, or a path component that is a regular file.
 */
export function isNotFoundError(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false
  return err.code === "ENOENT" || err.code === "ENOTDIR"
}
