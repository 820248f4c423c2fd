export type { IConfig } from "./ports/config"
export type { ConfigSource } from "./ports/source"

export { Config } from "./core/config"
export { ConfigError, type ConfigErrorCode } from "./core/config-error"
export { loadConfig, type LoadConfigOptions } from "./core/load"

export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { ObjectSource } from "./adapters/object/object-source"
