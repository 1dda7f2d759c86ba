import { type ConfigSource, DotenvSource, EnvSource, loadConfig } from "@catalog/config"
import { type AppConfig, type EnvConfig, envSchema } from "./schema"

export function mapEnvToConfig(env: EnvConfig): AppConfig {
  return {
    app: {
      env: env.APP_ENV,
      serviceName: env.SERVICE_NAME,
    },
    server: {
      host: env.SERVER_HOST,
      port: env.SERVER_PORT,
      shutdownTimeoutMs: env.SERVER_SHUTDOWN_TIMEOUT_MS,
      livenessPath: env.SERVER_LIVENESS_PATH,
      readinessPath: env.SERVER_READINESS_PATH,
      healthCheckTimeoutMs: env.HEALTH_CHECK_TIMEOUT_MS,
    },
    logging: {
      level: env.LOG_LEVEL,
      prettify: env.LOG_PRETTY,
    },
    requestId: {
      header: env.REQUEST_ID_HEADER,
    },
    requestLogging: {
      level: env.REQUEST_LOGGING_LEVEL,
    },
    database: {
      url: env.DATABASE_URL,
      poolMax: env.DATABASE_POOL_MAX,
      connectTimeoutMs: env.DATABASE_CONNECT_TIMEOUT_MS,
    },
    redis: {
      url: env.REDIS_URL,
      keyPrefix: env.REDIS_KEY_PREFIX,
    },
    cache: {
      batchSize: env.CACHE_BATCH_SIZE,
      cleanupTimeoutMs: env.CACHE_CLEANUP_TIMEOUT_MS,
    },
    pagination: {
      defaultLimit: env.PAGINATION_DEFAULT_LIMIT,
      maxLimit: env.PAGINATION_MAX_LIMIT,
    },
  }
}

/**
 * `.env.${NODE_ENV}` in `cwd` (optional), then the environment. Later sources win.
 */
export async function loadAppConfig(
  env: NodeJS.ProcessEnv,
  cwd: string = process.cwd(),
): Promise<AppConfig> {
  const sources: ConfigSource[] = [
    new DotenvSource({ file: `.env.${env.NODE_ENV ?? "development"}`, required: false, cwd }),
    new EnvSource({ env }),
  ]

  const result = await loadConfig({ schema: envSchema, sources })

  return mapEnvToConfig(result.value)
}
