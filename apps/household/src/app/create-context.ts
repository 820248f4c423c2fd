import { fileURLToPath } from "node:url"
import type { HouseholdRepositories } from "../domains/repositories"
import { type AppConfig, type EnvOverrides, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type CoreServices, createCoreServices } from "./services/core"
import { createDomainServices, type DomainServices } from "./services/domains"
import { createInfraClients, type InfraClients } from "./services/infra"

export type AppContextOptions = {
  /** The system of record. */
  repositories: HouseholdRepositories
  env?: NodeJS.ProcessEnv
  configOverrides?: EnvOverrides
  infraOverrides?: Partial<InfraClients>
  coreOverrides?: Partial<CoreServices>
}

export type AppContext = {
  config: AppConfig
  core: CoreServices
  infra: InfraClients
  services: DomainServices
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

export async function createAppContext(options: AppContextOptions): Promise<AppContext> {
  const projectRoot = fileURLToPath(new URL("../..", import.meta.url))

  const config = await loadAppConfig(
    options.env ?? process.env,
    options.configOverrides,
    projectRoot,
  )

  const core = createCoreServices(config, options.coreOverrides)
  const infra = createInfraClients(config, options.infraOverrides)
  const services = createDomainServices(config, core, infra, options.repositories)

  return {
    config,
    core,
    infra,
    services,
    createStartHooks,
    createStopHooks,
  }
}
