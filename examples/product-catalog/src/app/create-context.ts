import path from "node:path"
import { fileURLToPath } from "node:url"
import { type AppConfig, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type RegisterRoutesFn, registerRoutes } from "./routes"
import { type AppServices, createDefaultDomainServices, type DomainOverrides } from "./services"
import { type CoreServices, createCoreServices } from "./services/core"
import { createDefaultInfraClients, type InfraClients } from "./services/infra"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  /** Where `.env.*` files are looked up. Defaults to the package root. */
  cwd?: string
  coreOverrides?: Partial<CoreServices>
  infraOverrides?: Partial<InfraClients>
  domainOverrides?: DomainOverrides
}

export type AppContext = {
  config: AppConfig
  infra: InfraClients
  services: AppServices
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "..", "..")

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const config = await loadAppConfig(options.env ?? process.env, options.cwd ?? packageRoot)

  const core = { ...createCoreServices(config), ...options.coreOverrides }
  const infra = { ...createDefaultInfraClients(config, core), ...options.infraOverrides }
  const domains = createDefaultDomainServices(config, core, infra, options.domainOverrides)

  return {
    config,
    infra,
    services: { core, domains },
    registerRoutes,
    createStartHooks,
    createStopHooks,
  }
}
