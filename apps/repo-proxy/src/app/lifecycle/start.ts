import fs from "node:fs/promises"
import path from "node:path"
import type { LifecycleHook } from "@repoproxy/server"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  const { config, services } = context

  const hooks: LifecycleHook[] = []

  if (usesPostgres(context)) {
    hooks.push({
      name: "start:postgres",
      fn: async () => {
        await services.pgPool.query("select 1")
      },
    })
  }

  if (config.database.migrate) {
    hooks.push({
      name: "start:postgres:migrate",
      fn: async () => {
        const schema = await fs.readFile(path.join(context.projectRoot, "db", "schema.sql"), "utf-8")

        await services.pgPool.query(schema)
      },
    })
  }

  hooks.push({
    name: "start:cache-dir",
    fn: async () => {
      await fs.mkdir(config.cache.dir, { recursive: true })
    },
  })

  return hooks
}

/** The pool is only needed when an adapter built from config talks to Postgres. */
export function usesPostgres(context: AppContext): boolean {
  return (
    context.config.database.migrate ||
    !context.adapters.cacheIndex ||
    (!context.adapters.directory && context.config.proxy.repositories.source === "postgres")
  )
}

export type CreateStartHooksFn = typeof createStartHooks
