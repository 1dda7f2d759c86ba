export * from "./adapters/null/null-logger"
export * from "./adapters/pino/pino-logger"
export * from "./ports/log-context"
export * from "./ports/log-level"
export * from "./ports/logger"
export * from "./ports/logger-options"
