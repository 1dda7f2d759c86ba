import type { CacheKey } from "../../ports/cache-key"
import type { CacheBackend } from "../../ports/cache-health"
import type { CacheCallOptions } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"

/**
 * In-process cache backend for tests and local runs without Redis. Values
 * are copied in and out, so callers never share buffers with the store.
 */
export class MemoryBytesCache implements CacheBackend {
  private readonly entries = new Map<CacheKey, Uint8Array>()
  private readonly sets = new Map<CacheKey, Set<string>>()

  async get(key: CacheKey, opts?: CacheCallOptions): Promise<CacheResult<Uint8Array>> {
    opts?.signal?.throwIfAborted()

    return this.createCacheResult(this.entries.get(key))
  }

  async set(key: CacheKey, value: Uint8Array, opts?: CacheCallOptions): Promise<void> {
    opts?.signal?.throwIfAborted()

    this.sets.delete(key)
    this.entries.set(key, value.slice())
  }

  async invalidate(key: CacheKey, opts?: CacheCallOptions): Promise<void> {
    opts?.signal?.throwIfAborted()

    this.entries.delete(key)
    this.sets.delete(key)
  }

  async getMany(
    keys: readonly CacheKey[],
    opts?: CacheCallOptions,
  ): Promise<Map<CacheKey, CacheResult<Uint8Array>>> {
    opts?.signal?.throwIfAborted()

    const out = new Map<CacheKey, CacheResult<Uint8Array>>()
    for (const key of keys) {
      if (!out.has(key)) out.set(key, this.createCacheResult(this.entries.get(key)))
    }

    return out
  }

  async exists(key: CacheKey, opts?: CacheCallOptions): Promise<boolean> {
    opts?.signal?.throwIfAborted()

    return this.entries.has(key) || this.sets.has(key)
  }

  async addToSet(
    setKey: CacheKey,
    members: readonly string[],
    opts?: CacheCallOptions,
  ): Promise<void> {
    opts?.signal?.throwIfAborted()
    if (members.length === 0) return

    this.entries.delete(setKey)
    const set = this.sets.get(setKey) ?? new Set<string>()
    for (const m of members) set.add(m)
    this.sets.set(setKey, set)
  }

  async removeFromSet(
    setKey: CacheKey,
    members: readonly string[],
    opts?: CacheCallOptions,
  ): Promise<void> {
    opts?.signal?.throwIfAborted()

    const set = this.sets.get(setKey)
    if (!set) return

    for (const m of members) set.delete(m)
    // an empty set is a missing key, as in Redis
    if (set.size === 0) this.sets.delete(setKey)
  }

  async getSet(setKey: CacheKey, opts?: CacheCallOptions): Promise<string[]> {
    opts?.signal?.throwIfAborted()

    return [...(this.sets.get(setKey) ?? [])]
  }

  async deleteSet(setKey: CacheKey, opts?: CacheCallOptions): Promise<void> {
    opts?.signal?.throwIfAborted()

    this.sets.delete(setKey)
  }

  async ping(opts?: CacheCallOptions): Promise<void> {
    opts?.signal?.throwIfAborted()
  }

  /** Drops every entry and set. */
  clear(): void {
    this.entries.clear()
    this.sets.clear()
  }

  private createCacheResult(value: Uint8Array | undefined): CacheResult<Uint8Array> {
    if (value === undefined) return { kind: "miss" }

    return { kind: "hit", value: value.slice() }
  }
}
