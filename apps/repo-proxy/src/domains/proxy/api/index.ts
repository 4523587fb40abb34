import type { Application } from "@repoproxy/server"
import type { ProxyServices } from "../composition"
import { normalizeBasePath } from "../services/request-router"
import { proxyHandler } from "./proxy.handler"

type ProxyModuleDeps = {
  proxy: ProxyServices
  basePath: string
}

export function createProxyModule(deps: ProxyModuleDeps) {
  return {
    name: "proxy",
    register: (app: Application) => {
      app.get(`${normalizeBasePath(deps.basePath)}/*`, proxyHandler(deps.proxy))
    },
  }
}
