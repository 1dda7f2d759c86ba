/**
 * Bidirectional transform between a typed value and bytes.
 *
 * Codecs sit between typed cache usage (`DataCache<T>`) and byte-oriented
 * adapters. Adapters treat codec output as opaque and never import codecs.
 *
 * @remarks
 * Plain JSON loses `Date`, `Map`, `Set` and `BigInt`. Values that carry those
 * need a codec that preserves them, such as one built on superjson.
 */
export interface Codec<T> {
  encode(value: T): Uint8Array

  /** @throws when the bytes are not a valid encoding of `T` */
  decode(bytes: Uint8Array): T
}
