import type { BytesCache } from "../ports/bytes-cache"
import type { CacheKey } from "../ports/cache-key"
import type { CacheCallOptions } from "../ports/cache-options"
import type { CacheResult } from "../ports/cache-result"
import type { Codec } from "../ports/codec"
import type { DataCache } from "../ports/data-cache"
import { CacheError } from "./cache-error"

export class CodecDataCache<T> implements DataCache<T> {
  public constructor(
    private readonly bytesCache: BytesCache,
    private readonly codec: Codec<T>,
  ) {}

  async get(key: CacheKey, opts?: CacheCallOptions): Promise<CacheResult<T>> {
    const res = await this.bytesCache.get(key, opts)
    if (res.kind === "miss") return res

    return { kind: "hit", value: this.decode(key, res.value) }
  }

  async set(key: CacheKey, value: T, opts?: CacheCallOptions): Promise<void> {
    await this.bytesCache.set(key, this.codec.encode(value), opts)
  }

  async invalidate(key: CacheKey, opts?: CacheCallOptions): Promise<void> {
    await this.bytesCache.invalidate(key, opts)
  }

  async getMany(keys: readonly CacheKey[], opts?: CacheCallOptions): Promise<Map<CacheKey, T>> {
    const out = new Map<CacheKey, T>()
    if (keys.length === 0) return out

    const res = await this.bytesCache.getMany(keys, opts)

    for (const [key, result] of res) {
      if (result.kind === "hit") out.set(key, this.decode(key, result.value))
    }

    return out
  }

  async exists(key: CacheKey, opts?: CacheCallOptions): Promise<boolean> {
    return this.bytesCache.exists(key, opts)
  }

  private decode(key: CacheKey, bytes: Uint8Array): T {
    try {
      return this.codec.decode(bytes)
    } catch (err) {
      throw CacheError.decodeFailed(key, err)
    }
  }
}
