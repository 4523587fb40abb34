import { createPinoLogger } from "@repoproxy/logger"
import { run } from "./run"

run().catch((err: unknown) => {
  createPinoLogger().fatal("Failed to start", { err })
  process.exitCode = 1
})
