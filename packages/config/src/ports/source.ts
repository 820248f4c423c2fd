/**
 * Where raw configuration values come from.
 *
 * Sources only load. Coercion, defaults and validation belong to the schema
 * given to `loadConfig`. A key mapped to `undefined` counts as not provided.
 */
export interface ConfigSource {
  /** Shown by `explain()`, e.g. `env` or `dotenv:.env.test`. */
  readonly name: string

  load(): Promise<Record<string, unknown>>
}
