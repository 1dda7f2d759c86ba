import type { EventEmitter } from "node:events"
import { serve } from "@hono/node-server"
import type { Logger } from "@catalog/logger"
import type { Application } from "../server/app"
import type { ResolvedServerOptions } from "../server/server-options"
import type { Closeable } from "./shutdown"

export type Listening = {
  server: Closeable
  /** The bound port, which differs from the configured one when that is 0. */
  port: number
}

/** Resolves once the socket is bound, rejects if binding fails. */
export function listen(
  app: Application,
  options: Pick<ResolvedServerOptions, "host" | "port">,
  logger: Logger,
): Promise<Listening> {
  return new Promise((resolve, reject) => {
    const server: Closeable & EventEmitter = serve(
      { fetch: app.fetch, port: options.port, hostname: options.host },
      (info) => {
        server.off("error", reject)
        logger.info(`Server listening on http://${options.host}:${info.port}`)
        resolve({ server, port: info.port })
      },
    )

    server.once("error", reject)
  })
}

export type ListenFn = typeof listen
