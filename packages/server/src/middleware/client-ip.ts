import type { Context, MiddlewareHandler } from "hono"
import { isNonEmptyString } from "./utils/is-non-empty-string"

/**
 * Returns the client address from X-Forwarded-For given N trusted proxies.
 *
 * XFF: "client, proxy1, proxy2" (proxy2 is closest to this server)
 * trustedProxies = 1 -> "proxy1"
 * trustedProxies = 2 -> "client"
 */
export function ipFromXForwardedFor(
  xForwardedFor: string,
  trustedProxies: number,
): string | undefined {
  if (trustedProxies <= 0) return undefined

  const chain = xForwardedFor
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0)

  const idx = chain.length - 1 - trustedProxies
  if (idx < 0) return undefined

  return chain[idx]
}

/** `::ffff:1.2.3.4` (IPv4-mapped IPv6) -> `1.2.3.4` */
function normalizeRemoteAddress(ip: string): string {
  return ip.startsWith("::ffff:") ? ip.slice("::ffff:".length) : ip
}

type NodeBindings = { incoming?: { socket?: { remoteAddress?: string } } }

function isNodeBindings(env: unknown): env is NodeBindings {
  return typeof env === "object" && env !== null && "incoming" in env
}

function resolveRemoteIp(c: Context): string | undefined {
  const raw = isNodeBindings(c.env) ? c.env.incoming?.socket?.remoteAddress : undefined
  if (!isNonEmptyString(raw)) return undefined

  return normalizeRemoteAddress(raw.trim())
}

/**
 * Sets `remoteIp` from the socket and `clientIp` from X-Forwarded-For when
 * proxies are trusted, falling back to `remoteIp`.
 */
export function clientIpMiddleware(trustedProxies: number): MiddlewareHandler {
  return async (c, next) => {
    const remoteIp = resolveRemoteIp(c)

    const xff = c.req.header("x-forwarded-for")
    const forwarded = isNonEmptyString(xff)
      ? ipFromXForwardedFor(xff, trustedProxies)
      : undefined

    const clientIp = forwarded ?? remoteIp

    if (remoteIp) c.set("remoteIp", remoteIp)
    if (clientIp) c.set("clientIp", clientIp)

    await next()
  }
}
