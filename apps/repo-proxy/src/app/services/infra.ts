import { Pool } from "pg"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export type InfraServices = {
  pgPool: Pool
}

export function createInfraServices(config: AppConfig, core: CoreServices): InfraServices {
  const pgPool = new Pool({
    connectionString: config.database.url,
    max: config.database.poolMax,
  })

  // Idle clients can error when the server drops them; pg emits it on the pool.
  pgPool.on("error", (err) => {
    core.logger.error("Idle Postgres client failed", { err })
  })

  return { pgPool }
}
