export * from "./adapters/memory/memory-bytes-cache"
export * from "./adapters/redis/redis-bytes-cache"
export * from "./adapters/redis/redis-client"
export * from "./core/cache-error"
export * from "./core/codec-data-cache"
export type * from "./ports/bytes-cache"
export type * from "./ports/cache-health"
export type * from "./ports/cache-key"
export type * from "./ports/cache-options"
export type * from "./ports/cache-result"
export type * from "./ports/codec"
export type * from "./ports/data-cache"
export type * from "./ports/keyspace-prefix"
export type * from "./ports/set-store"
