import type { CacheKey } from "./cache-key"
import type { CacheCallOptions } from "./cache-options"
import type { CacheResult } from "./cache-result"

/**
 * Byte-oriented key/value cache. Entries never expire; they live until
 * overwritten or invalidated.
 */
export interface BytesCache {
  get(key: CacheKey, opts?: CacheCallOptions): Promise<CacheResult<Uint8Array>>

  set(key: CacheKey, value: Uint8Array, opts?: CacheCallOptions): Promise<void>

  /** No-op when the key is absent. */
  invalidate(key: CacheKey, opts?: CacheCallOptions): Promise<void>

  /**
   * Fetches many keys in batches. The map holds one entry per distinct key,
   * in first-seen order; absent keys are misses, never errors.
   */
  getMany(
    keys: readonly CacheKey[],
    opts?: CacheCallOptions,
  ): Promise<Map<CacheKey, CacheResult<Uint8Array>>>

  exists(key: CacheKey, opts?: CacheCallOptions): Promise<boolean>
}
