import type { ProgressSink } from "../../ports/progress-sink"

/**
 * Records every marker regardless of level.
 */
export class MemoryProgressSink implements ProgressSink {
  readonly markers: string[] = []

  write(marker: string, _level?: number): void {
    this.markers.push(marker)
  }

  toString(): string {
    return this.markers.join("")
  }
}
