export * from "./adapters/ulid"
export * from "./adapters/uuid"
export type * from "./core/brand"
export * from "./core/id-codec"
export type * from "./core/id-type"
export type * from "./ports/id-generator"
