import type { LifecycleHook } from "@repoproxy/server"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  return [
    {
      name: "stop:proxy:drain-writes",
      fn: async ({ signal }) => {
        const drained = await context.services.proxy.pendingWrites.drain(signal)

        if (!drained) {
          context.services.logger.warn("Shutdown deadline passed with cache writes pending", {
            pending: context.services.proxy.pendingWrites.size,
          })
        }
      },
    },
    {
      name: "stop:postgres",
      fn: async () => {
        await context.services.pgPool.end()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
