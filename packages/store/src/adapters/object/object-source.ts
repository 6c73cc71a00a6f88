import type { ConfigSource } from "../../ports/config-source"

export class ObjectSource implements ConfigSource {
  readonly name = "object"

  constructor(private readonly values: Record<string, unknown>) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
