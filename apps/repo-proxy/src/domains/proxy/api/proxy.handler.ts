import type { Context, RequestHandler } from "@repoproxy/server"
import type { ProxyServices } from "../composition"

export function proxyHandler(deps: ProxyServices): RequestHandler {
  return async (c: Context) => {
    const clientIp = c.get("clientIp")

    return deps.proxy.handle({
      // c.req.path is decoded; cache keys keep the raw form
      pathname: new URL(c.req.url).pathname,
      headers: c.req.raw.headers,
      ...(clientIp !== undefined && { clientIp }),
      logger: c.get("logger") ?? deps.logger,
    })
  }
}
