import { createClient, RESP_TYPES } from "redis"

/**
 * The slice of a node-redis client the cache uses, with bulk strings
 * mapped to Buffers so values round-trip as bytes.
 */
export type RedisBytesClient = {
  readonly isOpen: boolean

  connect(): Promise<unknown>
  close(): Promise<unknown>

  withAbortSignal(signal: AbortSignal): RedisBytesClient

  get(key: string): Promise<Buffer | null>
  mGet(keys: string[]): Promise<(Buffer | null)[]>
  set(key: string, value: Buffer): Promise<unknown>
  del(keys: string | string[]): Promise<number>
  exists(keys: string | string[]): Promise<number>

  sAdd(key: string, members: string | string[]): Promise<number>
  sRem(key: string, members: string | string[]): Promise<number>
  sMembers(key: string): Promise<Buffer[]>

  ping(): Promise<string>
}

export type RedisBytesClientOptions = {
  url: string

  /** Connection errors are emitted as events; unhandled ones crash the process. */
  onError: (err: unknown) => void
}

export function createRedisBytesClient({ url, onError }: RedisBytesClientOptions): RedisBytesClient {
  // commands fail fast while disconnected instead of queueing behind a reconnect
  const client = createClient({ url, disableOfflineQueue: true })
  client.on("error", onError)

  return client.withTypeMapping({
    [RESP_TYPES.BLOB_STRING]: Buffer,
  }) as unknown as RedisBytesClient
}
