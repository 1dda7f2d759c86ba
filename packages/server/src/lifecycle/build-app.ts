import type { Logger } from "@catalog/logger"
import type { ErrorHandler } from "../errors/create-error-handler"
import { registerHealthRoutes } from "../routes/health"
import type { Application, Middleware } from "../server/app"
import type { ResolvedServerOptions } from "../server/server-options"

export interface BuildAppContext {
  app: Application
  options: ResolvedServerOptions
  logger: Logger
  isReady: () => boolean
  errorHandler: ErrorHandler
  defaultMiddleware: Middleware[]
}

/**
 * Order: default middleware, health routes, application routes.
 * Unknown routes answer with a JSON 404.
 */
export function buildApp(ctx: BuildAppContext): Application {
  const { app, options } = ctx

  for (const mw of ctx.defaultMiddleware) app.use("*", mw)

  registerHealthRoutes(app, options.health, ctx.isReady, ctx.logger)

  options.routes(app)

  app.notFound((c) =>
    c.json(
      {
        error: {
          status: 404,
          code: "route_not_found",
          message: "Route not found",
          requestId: c.get("requestId") ?? "unknown",
        },
      },
      404,
    ),
  )

  app.onError(ctx.errorHandler)

  return app
}

export type BuildAppFn = typeof buildApp
