import { z } from "zod/mini"
import type { $ZodType } from "zod/v4/core"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { Config } from "./config"

export type LoadConfigOptions<T extends Record<string, unknown>> = {
  schema: $ZodType<T>
  /** @default [new EnvSource()] */
  sources?: ConfigSource[]
}

export class ConfigValidationError extends Error {
  constructor(readonly issues: string) {
    super(`Configuration validation failed:\n${issues}`)
    this.name = "ConfigValidationError"
  }
}

export async function loadConfig<T extends Record<string, unknown>>({
  schema,
  sources,
}: LoadConfigOptions<T>): Promise<IConfig<T>> {
  const merged: Record<string, unknown> = {}
  const provenance = new Map<string, string>()

  for (const source of sources ?? [new EnvSource()]) {
    const values = await source.load()

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue

      merged[key] = value
      provenance.set(key, source.name)
    }
  }

  const result = z.safeParse(schema, merged)

  if (!result.success) {
    throw new ConfigValidationError(z.prettifyError(result.error))
  }

  return new Config<T>(result.data, provenance, new Set(Object.keys(merged)))
}
