import type { LifecycleHook } from "@catalog/server"
import type { AppContext } from "../create-context"

export function createStartHooks(context: AppContext): LifecycleHook[] {
  return [
    {
      name: "start:redis",
      fn: async () => {
        if (!context.infra.redisClient.isOpen) await context.infra.redisClient.connect()
      },
    },
    {
      name: "start:postgres",
      fn: async ({ signal }) => {
        await context.services.domains.products.repository.healthCheck({ signal })
      },
    },
  ]
}

export type CreateStartHooksFn = typeof createStartHooks
