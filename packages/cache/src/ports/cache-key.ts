/**
 * A plain string key. Build keys through a keyspace helper rather than
 * interpolating at call sites, so formats stay consistent.
 *
 * @example
 * ```ts
 * const key: CacheKey = "product_01J0000000000000000000000"
 * ```
 */
export type CacheKey = string
