import {
  type Application,
  createServer,
  type ErrorMappingsConfig,
  type LifecycleHook,
  type ReadinessCheck,
  type Server,
} from "@catalog/server"
import type { AppContext } from "../app/create-context"

export type BuiltServer = {
  app: Application
  server: Server
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

export const productErrorMappings: ErrorMappingsConfig = {
  mappings: {
    validation_error: { status: 400, message: "Invalid request" },
    invalid_product: { status: 400, message: "Invalid product" },
    product_not_found: { status: 404, message: "Product not found" },
    product_already_exists: { status: 409, message: "Product already exists" },
    version_conflict: {
      status: 409,
      message: "Product was modified concurrently, reload and retry",
    },
    store_unavailable: { status: 503, message: "Service temporarily unavailable" },
  },
  transformContext: (error) =>
    error.code === "validation_error" || error.code === "invalid_product"
      ? { details: error.message }
      : undefined,
}

export function buildServer(ctx: AppContext): BuiltServer {
  const startHooks = ctx.createStartHooks(ctx)
  const stopHooks = ctx.createStopHooks(ctx)
  const { products } = ctx.services.domains

  const readinessChecks: ReadinessCheck[] = [
    {
      name: "postgres",
      fn: async (signal) => {
        await products.repository.healthCheck({ signal })
        return true
      },
    },
    {
      name: "redis",
      fn: async (signal) => {
        await products.cache.ping({ signal })
        return true
      },
    },
  ]

  const server = createServer(
    {
      clock: ctx.services.core.clock,
      logger: ctx.services.core.logger,
    },
    {
      host: ctx.config.server.host,
      port: ctx.config.server.port,
      shutdownTimeoutMs: ctx.config.server.shutdownTimeoutMs,

      errors: productErrorMappings,

      requestId: {
        enabled: true,
        header: ctx.config.requestId.header,
      },

      requestLogging: {
        enabled: true,
        level: ctx.config.requestLogging.level,
      },

      health: {
        enabled: true,
        livenessPath: ctx.config.server.livenessPath,
        readinessPath: ctx.config.server.readinessPath,
        checkTimeoutMs: ctx.config.server.healthCheckTimeoutMs,
        readinessChecks,
      },

      routes: (app: Application): void => {
        ctx.registerRoutes(app, ctx.config, ctx.services.domains)
      },

      startHooks,
      stopHooks,
    },
  )

  return {
    app: server.app,
    server,
    startHooks,
    stopHooks,
  }
}

