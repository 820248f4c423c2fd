/**
 * Validated configuration plus a record of where each value came from.
 *
 * @example
 * ```ts
 * const config = await loadConfig({
 *   schema: z.object({ CACHE_TTL_SECONDS: z.coerce.number().default(3600) }),
 *   sources: [new DotenvSource({ file: ".env.test", required: false }), new EnvSource()],
 * })
 *
 * config.value.CACHE_TTL_SECONDS // 3600
 * config.explain("CACHE_TTL_SECONDS") // "default"
 * ```
 */
export interface IConfig<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  /** Source that supplied `key`, or `"default"` when the schema filled it in. */
  explain<K extends keyof T & string>(key: K): string

  /** Sources that supplied at least one of the final values. */
  sourcesUsed(): string[]

  /** Keys some source supplied that the schema does not know about. */
  unknownKeys(): string[]
}
