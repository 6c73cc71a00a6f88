import type { ProgressSink } from "../../ports/progress-sink"

const DEFAULT_VERBOSITY = 3

export type StreamProgressSinkDeps = {
  /** Default: process.stderr */
  stream?: NodeJS.WritableStream
}

export interface StreamProgressSinkOptions {
  /** Markers at this level or above are dropped. 0 silences the sink. Default: 3 */
  verbosity?: number
}

export class StreamProgressSink implements ProgressSink {
  private readonly stream: NodeJS.WritableStream
  private readonly verbosity: number

  constructor(deps: StreamProgressSinkDeps = {}, options: StreamProgressSinkOptions = {}) {
    this.stream = deps.stream ?? process.stderr
    this.verbosity = options.verbosity ?? DEFAULT_VERBOSITY
  }

  write(marker: string, level = 0): void {
    if (level < this.verbosity) this.stream.write(marker)
  }
}
