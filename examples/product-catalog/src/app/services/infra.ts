import { createRedisBytesClient, type RedisBytesClient } from "@catalog/cache"
import { Pool } from "pg"
import type { PgQueryable } from "../../domains/products/infra/product-repository.postgres"
import type { AppConfig } from "../config"
import type { CoreServices } from "./core"

export interface PgPool extends PgQueryable {
  end(): Promise<void>
}

export type InfraClients = {
  redisClient: RedisBytesClient
  pgPool: PgPool
}

/** Nothing connects here; the start hooks open the connections. */
export function createDefaultInfraClients(config: AppConfig, core: CoreServices): InfraClients {
  const log = core.logger.child({ module: "infra" })

  const redisClient = createRedisBytesClient({
    url: config.redis.url,
    onError: (err) => log.warn("Redis client error", { err }),
  })

  const pool = new Pool({
    connectionString: config.database.url,
    max: config.database.poolMax,
    connectionTimeoutMillis: config.database.connectTimeoutMs,
  })

  pool.on("error", (err) => log.warn("Idle Postgres client error", { err }))

  return { redisClient, pgPool: pool }
}
