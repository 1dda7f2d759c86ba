import type { CacheKey } from "./cache-key"
import type { CacheCallOptions } from "./cache-options"

/**
 * Named sets of string members, used for secondary indexes kept next to
 * cached entries.
 */
export interface SetStore {
  addToSet(setKey: CacheKey, members: readonly string[], opts?: CacheCallOptions): Promise<void>

  removeFromSet(
    setKey: CacheKey,
    members: readonly string[],
    opts?: CacheCallOptions,
  ): Promise<void>

  /** Members in no particular order. A missing set is empty. */
  getSet(setKey: CacheKey, opts?: CacheCallOptions): Promise<string[]>

  deleteSet(setKey: CacheKey, opts?: CacheCallOptions): Promise<void>
}
