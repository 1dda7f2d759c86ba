/**
 * Prefix that scopes an adapter instance to its partition of a shared
 * keyspace, e.g. `catalog:` on a Redis shared with other services.
 *
 * Adapters treat it as an opaque string prepended to every key they touch,
 * including set keys.
 */
export type KeyspacePrefix = string
