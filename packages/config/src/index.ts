export * from "./adapters/dotenv/dotenv-source"
export * from "./adapters/env/env-source"
export * from "./core/config"
export * from "./core/config-error"
export * from "./core/load"
export type * from "./ports/config"
export type * from "./ports/source"
