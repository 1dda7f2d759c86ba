import "./types/context"

export {
  type ErrorHandler,
  type ErrorMapping,
  type ErrorMappingsConfig,
  type ErrorResponse,
  isValidationError,
  parseOrThrow,
  ServerError,
  type ServerErrorCode,
  ValidationError,
  type ValidationIssue,
} from "./errors"
export type { StatusCode } from "./http/status-codes"
export type { ServerHandle } from "./lifecycle/create-stopper"
export type { LifecycleHook, LifecycleHookContext, PhaseResult } from "./lifecycle/lifecycle-hook"
export type { StopResult } from "./lifecycle/shutdown"
export {
  type Application,
  type Context,
  createApp,
  createRouter,
  type Middleware,
  type RequestHandler,
  type Router,
} from "./server/app"
export { createServer, Server, type ServerState } from "./server/server"
export type {
  PathString,
  ReadinessCheck,
  ServerDependencies,
  ServerOptions,
} from "./server/server-options"
