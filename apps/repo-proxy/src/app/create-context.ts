import path from "node:path"
import type { ProxyAdapters } from "../domains/proxy/composition"
import { type AppConfig, loadAppConfig } from "./config"
import { type CreateStartHooksFn, createStartHooks } from "./lifecycle/start"
import { type CreateStopHooksFn, createStopHooks } from "./lifecycle/stop"
import { type RegisterRoutesFn, registerRoutes } from "./routes"
import {
  type AppServices,
  type CoreServices,
  createAppServices,
  createCoreServices,
  createInfraServices,
  type InfraServices,
} from "./services"

export type AppContextOptions = {
  env?: NodeJS.ProcessEnv
  /** Directory holding `db/` and the `.env.*` files. */
  projectRoot?: string
  core?: Partial<CoreServices>
  infra?: InfraServices
  adapters?: ProxyAdapters
}

export type AppContext = {
  config: AppConfig
  projectRoot: string
  services: AppServices
  adapters: ProxyAdapters
  registerRoutes: RegisterRoutesFn
  createStartHooks: CreateStartHooksFn
  createStopHooks: CreateStopHooksFn
}

export async function createAppContext(options: AppContextOptions = {}): Promise<AppContext> {
  const projectRoot = options.projectRoot ?? path.resolve(__dirname, "..", "..")

  const config = await loadAppConfig(options.env ?? process.env, projectRoot)

  const core: CoreServices = { ...createCoreServices(config), ...options.core }

  const infra = options.infra ?? createInfraServices(config, core)

  const adapters = options.adapters ?? {}

  const services = createAppServices(config, core, infra, adapters)

  return {
    config,
    projectRoot,
    services,
    adapters,
    registerRoutes,
    createStartHooks,
    createStopHooks,
  }
}
