import type { LifecycleHook } from "@catalog/server"
import type { AppContext } from "../create-context"

export function createStopHooks(context: AppContext): LifecycleHook[] {
  return [
    {
      name: "stop:products:cleanup",
      fn: async ({ signal }) => {
        await context.services.domains.products.cleanup.drain(signal)
      },
    },
    {
      name: "stop:redis",
      fn: async () => {
        if (context.infra.redisClient.isOpen) await context.infra.redisClient.close()
      },
    },
    {
      name: "stop:postgres",
      fn: async () => {
        await context.infra.pgPool.end()
      },
    },
  ]
}

export type CreateStopHooksFn = typeof createStopHooks
