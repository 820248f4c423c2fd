import type { IConfig } from "../ports/config"

export class Config<T extends Record<string, unknown>> implements IConfig<T> {
  readonly value: Readonly<T>

  constructor(
    value: T,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly suppliedKeys: ReadonlySet<string>,
  ) {
    this.value = Object.freeze({ ...value })
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance.get(key) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())]
  }

  unknownKeys(): string[] {
    const known = new Set(Object.keys(this.value))
    return [...this.suppliedKeys].filter((key) => !known.has(key))
  }
}
