import type { Application } from "@repoproxy/server"
import { createProxyModule } from "../domains/proxy"
import type { AppConfig } from "./config"
import type { AppServices } from "./services"

export type ApiModule = {
  name: string
  register: (app: Application) => void
}

export function registerRoutes(app: Application, config: AppConfig, services: AppServices): void {
  const modules: ApiModule[] = [
    createProxyModule({ proxy: services.proxy, basePath: config.proxy.basePath }),
  ]

  for (const m of modules) {
    m.register(app)
  }
}

export type RegisterRoutesFn = typeof registerRoutes
