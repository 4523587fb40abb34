import { z } from "zod/mini"
import type { ConfigSource } from "../../ports/source"
import { ConfigValidationError, loadConfig } from "../load"

const schema = z.object({
  PORT: z._default(z.coerce.number(), 5000),
  CACHE_DIR: z._default(z.string(), "/cache"),
  CACHE_FAIL_OPEN: z._default(z.stringbool(), true),
})

function source(name: string, values: Record<string, unknown>): ConfigSource {
  return { name, load: async () => values }
}

describe("loadConfig", () => {
  it("applies schema defaults when no source provides a key", async () => {
    const config = await loadConfig({ schema, sources: [] })

    expect(config.value).toEqual({ PORT: 5000, CACHE_DIR: "/cache", CACHE_FAIL_OPEN: true })
    expect(config.explain("PORT")).toBe("default")
  })

  it("lets later sources override earlier ones and records provenance", async () => {
    const config = await loadConfig({
      schema,
      sources: [
        source("dotenv:.env.test", { PORT: "6000", CACHE_DIR: "/srv/cache" }),
        source("env", { PORT: "7000", CACHE_FAIL_OPEN: "false" }),
      ],
    })

    expect(config.value).toEqual({
      PORT: 7000,
      CACHE_DIR: "/srv/cache",
      CACHE_FAIL_OPEN: false,
    })
    expect(config.explain("PORT")).toBe("env")
    expect(config.explain("CACHE_DIR")).toBe("dotenv:.env.test")
    expect(config.sourcesUsed()).toEqual(["env", "dotenv:.env.test"])
  })

  it("skips undefined values", async () => {
    const config = await loadConfig({
      schema,
      sources: [source("env", { PORT: undefined })],
    })

    expect(config.value.PORT).toBe(5000)
  })

  it("reports keys the schema does not know", async () => {
    const config = await loadConfig({
      schema,
      sources: [source("env", { PORT: "1", HOME: "/root" })],
    })

    expect(config.unknownKeys()).toEqual(["HOME"])
  })

  it("throws a readable error on invalid values", async () => {
    const load = loadConfig({
      schema,
      sources: [source("env", { PORT: "not-a-number" })],
    })

    await expect(load).rejects.toBeInstanceOf(ConfigValidationError)
    await expect(load).rejects.toThrow(/PORT/)
  })
})
