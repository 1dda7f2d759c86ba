import { CacheError } from "../../core/cache-error"
import type { CacheKey } from "../../ports/cache-key"
import type { CacheBackend } from "../../ports/cache-health"
import type { CacheCallOptions } from "../../ports/cache-options"
import type { CacheResult } from "../../ports/cache-result"
import type { KeyspacePrefix } from "../../ports/keyspace-prefix"
import type { RedisBytesClient } from "./redis-client"

export type RedisBytesCacheOptions = {
  /**
   * Keys per MGET. Larger reads are split so one call never builds an
   * oversized command.
   */
  batchSize: number

  keyspacePrefix: KeyspacePrefix
}

export class RedisBytesCache implements CacheBackend {
  public constructor(
    private readonly client: RedisBytesClient,
    private readonly opts: RedisBytesCacheOptions,
  ) {
    if (!Number.isInteger(opts.batchSize) || opts.batchSize < 1) {
      throw new RangeError(`batchSize must be a positive integer, got ${opts.batchSize}`)
    }
  }

  async get(key: CacheKey, opts?: CacheCallOptions): Promise<CacheResult<Uint8Array>> {
    const buffer = await this.run("get", opts, (c) => c.get(this.fullKey(key)))

    return this.createCacheResult(buffer)
  }

  async set(key: CacheKey, value: Uint8Array, opts?: CacheCallOptions): Promise<void> {
    const buffer = Buffer.from(value)

    await this.run("set", opts, (c) => c.set(this.fullKey(key), buffer))
  }

  async invalidate(key: CacheKey, opts?: CacheCallOptions): Promise<void> {
    await this.run("invalidate", opts, (c) => c.del(this.fullKey(key)))
  }

  async getMany(
    keys: readonly CacheKey[],
    opts?: CacheCallOptions,
  ): Promise<Map<CacheKey, CacheResult<Uint8Array>>> {
    const out = new Map<CacheKey, CacheResult<Uint8Array>>()
    const unique = [...new Set(keys)]

    for (const batch of this.chunks(unique, this.opts.batchSize)) {
      const buffers = await this.run("getMany", opts, (c) =>
        c.mGet(batch.map((k) => this.fullKey(k))),
      )

      for (const [i, key] of batch.entries()) {
        out.set(key, this.createCacheResult(buffers[i] ?? null))
      }
    }

    return out
  }

  async exists(key: CacheKey, opts?: CacheCallOptions): Promise<boolean> {
    const count = await this.run("exists", opts, (c) => c.exists(this.fullKey(key)))

    return count > 0
  }

  async addToSet(
    setKey: CacheKey,
    members: readonly string[],
    opts?: CacheCallOptions,
  ): Promise<void> {
    if (members.length === 0) return

    await this.run("addToSet", opts, (c) => c.sAdd(this.fullKey(setKey), [...members]))
  }

  async removeFromSet(
    setKey: CacheKey,
    members: readonly string[],
    opts?: CacheCallOptions,
  ): Promise<void> {
    if (members.length === 0) return

    await this.run("removeFromSet", opts, (c) => c.sRem(this.fullKey(setKey), [...members]))
  }

  async getSet(setKey: CacheKey, opts?: CacheCallOptions): Promise<string[]> {
    const members = await this.run("getSet", opts, (c) => c.sMembers(this.fullKey(setKey)))

    return members.map((m) => m.toString("utf8"))
  }

  async deleteSet(setKey: CacheKey, opts?: CacheCallOptions): Promise<void> {
    await this.run("deleteSet", opts, (c) => c.del(this.fullKey(setKey)))
  }

  async ping(opts?: CacheCallOptions): Promise<void> {
    await this.run("ping", opts, (c) => c.ping())
  }

  private async run<R>(
    operation: string,
    opts: CacheCallOptions | undefined,
    fn: (client: RedisBytesClient) => Promise<R>,
  ): Promise<R> {
    const client = opts?.signal ? this.client.withAbortSignal(opts.signal) : this.client

    try {
      return await fn(client)
    } catch (err) {
      throw CacheError.unavailable(operation, err)
    }
  }

  private *chunks<T>(items: readonly T[], size: number): Generator<readonly T[]> {
    for (let i = 0; i < items.length; i += size) {
      yield items.slice(i, i + size)
    }
  }

  private createCacheResult(buffer: Buffer | null): CacheResult<Uint8Array> {
    if (buffer === null) return { kind: "miss" }

    return { kind: "hit", value: new Uint8Array(buffer) }
  }

  private fullKey(k: CacheKey): string {
    return `${this.opts.keyspacePrefix}${k}`
  }
}
