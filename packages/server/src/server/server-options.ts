import type { Clock, Milliseconds } from "@catalog/clock"
import { uuidV7 } from "@catalog/id"
import type { Logger, LogLevelName } from "@catalog/logger"
import type { ErrorMappingsConfig } from "../errors/errors"
import type { LifecycleHook } from "../lifecycle/lifecycle-hook"
import type { Application } from "./app"

export type PathString = `/${string}`

export interface ServerDependencies {
  logger: Logger
  clock: Clock
}

/** A feature section that is on unless `enabled: false` is given. */
export type Toggle<T> = { enabled: false } | ({ enabled: true } & T)

export interface RequestIdSettings {
  /** Header read from the request and echoed on the response. */
  header: string

  /** Used when the request carries no id. */
  generate: () => string
}

export interface RequestLoggingSettings {
  /** Level for completed requests. 5xx responses always log at `error`. */
  level: LogLevelName

  /** Requests to these paths are not logged. */
  ignorePaths: PathString[]
}

export interface ReadinessCheck {
  name: string
  timeoutMs?: Milliseconds
  fn: (signal: AbortSignal) => Promise<boolean>
}

export interface HealthSettings {
  livenessPath: PathString
  readinessPath: PathString

  /** Run in order on every readiness request; the first failure wins. */
  readinessChecks: ReadinessCheck[]

  /** Per-check bound unless the check sets its own `timeoutMs`. */
  checkTimeoutMs: Milliseconds
}

export interface ServerOptions {
  port: number

  /** @default "0.0.0.0" */
  host?: string

  /** @default no bound */
  startupTimeoutMs?: Milliseconds

  /** @default 10_000 */
  shutdownTimeoutMs?: Milliseconds

  /** @default enabled, `x-request-id`, UUIDv7 */
  requestId?: Toggle<Partial<RequestIdSettings>>

  /** @default enabled at `info`, ignoring the health paths */
  requestLogging?: Toggle<Partial<RequestLoggingSettings>>

  /** @default enabled on `/health` and `/ready` with no checks */
  health?: Toggle<Partial<HealthSettings>>

  /** Maps `AppError` codes to responses. */
  errors: ErrorMappingsConfig

  routes: (app: Application) => void

  startHooks?: LifecycleHook[]
  stopHooks?: LifecycleHook[]
}

export type ResolvedRequestIdConfig = Toggle<RequestIdSettings>
export type ResolvedRequestLoggingConfig = Toggle<RequestLoggingSettings>
export type ResolvedHealthConfig = Toggle<HealthSettings>

export type ResolvedServerOptions = {
  port: number
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: ResolvedRequestIdConfig
  requestLogging: ResolvedRequestLoggingConfig
  health: ResolvedHealthConfig
  errors: ErrorMappingsConfig
  routes: (app: Application) => void
  startHooks: LifecycleHook[]
  stopHooks: LifecycleHook[]
}

// setTimeout's ceiling
const MAX_TIMER_MS: Milliseconds = 2_147_483_647

export const DEFAULTS = {
  host: "0.0.0.0",
  startupTimeoutMs: MAX_TIMER_MS,
  shutdownTimeoutMs: 10_000,
  requestId: {
    header: "x-request-id",
    generate: () => uuidV7.generate(),
  },
  requestLogging: {
    level: "info",
  },
  health: {
    livenessPath: "/health",
    readinessPath: "/ready",
    checkTimeoutMs: 5_000,
  },
} satisfies {
  host: string
  startupTimeoutMs: Milliseconds
  shutdownTimeoutMs: Milliseconds
  requestId: RequestIdSettings
  requestLogging: Omit<RequestLoggingSettings, "ignorePaths">
  health: Omit<HealthSettings, "readinessChecks">
}

export function resolveOptions(options: ServerOptions): ResolvedServerOptions {
  const health = resolveHealth(options.health)

  return {
    port: options.port,
    host: options.host ?? DEFAULTS.host,
    startupTimeoutMs: options.startupTimeoutMs ?? DEFAULTS.startupTimeoutMs,
    shutdownTimeoutMs: options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
    requestId: resolveRequestId(options.requestId),
    requestLogging: resolveRequestLogging(options.requestLogging, health),
    health,
    errors: options.errors,
    routes: options.routes,
    startHooks: options.startHooks ?? [],
    stopHooks: options.stopHooks ?? [],
  }
}

function resolveHealth(given: ServerOptions["health"]): ResolvedHealthConfig {
  if (given?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    livenessPath: given?.livenessPath ?? DEFAULTS.health.livenessPath,
    readinessPath: given?.readinessPath ?? DEFAULTS.health.readinessPath,
    readinessChecks: given?.readinessChecks ?? [],
    checkTimeoutMs: given?.checkTimeoutMs ?? DEFAULTS.health.checkTimeoutMs,
  }
}

function resolveRequestId(given: ServerOptions["requestId"]): ResolvedRequestIdConfig {
  if (given?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    header: given?.header ?? DEFAULTS.requestId.header,
    generate: given?.generate ?? DEFAULTS.requestId.generate,
  }
}

// health paths are left out of the request log by default
function resolveRequestLogging(
  given: ServerOptions["requestLogging"],
  health: ResolvedHealthConfig,
): ResolvedRequestLoggingConfig {
  if (given?.enabled === false) return { enabled: false }

  return {
    enabled: true,
    level: given?.level ?? DEFAULTS.requestLogging.level,
    ignorePaths:
      given?.ignorePaths ?? (health.enabled ? [health.livenessPath, health.readinessPath] : []),
  }
}
