/**
 * Write-only destination for terse progress markers ("." per network round
 * trip, "!" per failed download). Never consulted for control flow.
 */
export interface ProgressSink {
  /**
   * @param level - Lower is more important. Sinks may drop markers whose
   * level is at or above their verbosity. Default: 0
   */
  write(marker: string, level?: number): void
}

export const ProgressMarkers = {
  RoundTrip: ".",
  DownloadFailed: "!",
} as const
