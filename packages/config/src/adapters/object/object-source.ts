import type { ConfigSource } from "../../ports/source"

/** Fixed values, typically test or CLI overrides applied last. */
export class ObjectSource implements ConfigSource {
  constructor(
    private readonly values: Readonly<Record<string, unknown>>,
    readonly name = "object:overrides",
  ) {}

  async load(): Promise<Record<string, unknown>> {
    return { ...this.values }
  }
}
