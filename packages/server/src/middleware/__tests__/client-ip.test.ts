import { Hono } from "hono"
import { clientIpMiddleware, ipFromXForwardedFor } from "../client-ip"

describe("ipFromXForwardedFor", () => {
  it.each([
    ["client, proxy1, proxy2", 1, "proxy1"],
    ["client, proxy1, proxy2", 2, "client"],
    ["client, proxy1, proxy2", 3, undefined],
    ["client", 0, undefined],
    [" , client ,", 0, undefined],
  ])("%s with %i trusted proxies -> %s", (xff, trusted, expected) => {
    expect(ipFromXForwardedFor(xff, trusted)).toBe(expected)
  })
})

describe("clientIpMiddleware", () => {
  function appWith(trustedProxies: number) {
    const app = new Hono()

    app.use("*", clientIpMiddleware(trustedProxies))
    app.get("/", (c) => c.json({ clientIp: c.get("clientIp") ?? null, remoteIp: c.get("remoteIp") ?? null }))

    return app
  }

  const incoming = (remoteAddress: string) => ({ incoming: { socket: { remoteAddress } } })

  it("uses the socket address when no proxy is trusted", async () => {
    const res = await appWith(0).request(
      "/",
      { headers: { "x-forwarded-for": "203.0.113.9" } },
      incoming("::ffff:10.0.0.5"),
    )

    expect(await res.json()).toEqual({ clientIp: "10.0.0.5", remoteIp: "10.0.0.5" })
  })

  it("takes the forwarded client behind trusted proxies", async () => {
    const res = await appWith(1).request(
      "/",
      { headers: { "x-forwarded-for": "203.0.113.9, 10.0.0.1" } },
      incoming("10.0.0.1"),
    )

    expect(await res.json()).toEqual({ clientIp: "203.0.113.9", remoteIp: "10.0.0.1" })
  })

  it("leaves both unset without a socket or header", async () => {
    const res = await appWith(1).request("/")

    expect(await res.json()).toEqual({ clientIp: null, remoteIp: null })
  })
})
