/**
 * Raw configuration values, unvalidated. Sources are applied in order and
 * later sources override earlier ones; `undefined` means "not provided".
 */
export interface ConfigSource {
  /** Shown in validation errors, e.g. "env" */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
