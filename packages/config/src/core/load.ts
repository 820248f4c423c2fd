import { type ZodType, z } from "zod"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"
import { ConfigError } from "./config-error"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: ZodType<T>
  /** Applied in order; later sources win. Defaults to the process environment. */
  sources?: readonly ConfigSource[]
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources = [new EnvSource()],
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  for (const source of sources) {
    let values: Record<string, unknown>
    try {
      values = await source.load()
    } catch (err) {
      throw ConfigError.sourceFailed(source.name, err)
    }

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue
      merged[key] = value
      provenance.set(key, source.name)
    }
  }

  const result = schema.safeParse(merged)

  if (!result.success) {
    throw ConfigError.invalid(z.prettifyError(result.error))
  }

  return new Config(result.data, provenance, new Set(Object.keys(merged)))
}
