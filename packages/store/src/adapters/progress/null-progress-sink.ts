import type { ProgressSink } from "../../ports/progress-sink"

export class NullProgressSink implements ProgressSink {
  write(_marker: string, _level?: number): void {}
}
