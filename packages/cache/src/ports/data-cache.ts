import type { CacheKey } from "./cache-key"
import type { CacheCallOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"

/**
 * Typed view over a byte cache, for derived and non-authoritative data.
 *
 * @remarks
 * A miss never implies absence in the source of truth, and every call may
 * fail. Callers that need correctness fall back to their store.
 */
export interface DataCache<T> {
  get(key: CacheKey, opts?: CacheCallOptions): Promise<CacheResult<T>>

  set(key: CacheKey, value: T, opts?: CacheCallOptions): Promise<void>

  invalidate(key: CacheKey, opts?: CacheCallOptions): Promise<void>

  /**
   * Hits only, keyed by the requested key. Compare its size with the number
   * of requested keys to detect partial coverage.
   */
  getMany(keys: readonly CacheKey[], opts?: CacheCallOptions): Promise<Map<CacheKey, T>>

  exists(key: CacheKey, opts?: CacheCallOptions): Promise<boolean>
}
