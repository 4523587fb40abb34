import {
  createProxyServices,
  type ProxyAdapters,
  type ProxyServices,
} from "../../domains/proxy/composition"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"
import type { InfraServices } from "./infra"

export type AppServices = CoreServices &
  InfraServices & {
    proxy: ProxyServices
  }

export function createAppServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraServices,
  adapters: ProxyAdapters = {},
): AppServices {
  const proxy = createProxyServices(config, core, infra, adapters)

  return {
    ...core,
    ...infra,
    proxy,
  }
}

export { type CoreServices, createCoreServices } from "./core"
export { createInfraServices, type InfraServices } from "./infra"
