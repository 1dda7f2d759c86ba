export type CacheCallOptions = {
  /** Aborts the in-flight command. The cache rejects with `cache_unavailable`. */
  signal?: AbortSignal | undefined
}
