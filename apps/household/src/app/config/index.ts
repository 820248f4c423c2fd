export { loadAppConfig, mapEnvToConfig } from "./load-app-config"
export {
  type AppConfig,
  type CacheDriver,
  type EnvConfig,
  type EnvOverrides,
  envSchema,
} from "./schema"
