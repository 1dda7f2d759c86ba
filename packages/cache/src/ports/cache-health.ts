import type { BytesCache } from "./bytes-cache"
import type { CacheCallOptions } from "./cache-options"
import type { SetStore } from "./set-store"

export interface CacheHealth {
  /** Resolves when the backend answers. */
  ping(opts?: CacheCallOptions): Promise<void>
}

/** Everything a cache adapter offers: entries, sets and a health probe. */
export type CacheBackend = BytesCache & SetStore & CacheHealth
