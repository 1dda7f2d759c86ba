import type { Codec } from "@catalog/cache"
import superjson from "superjson"

const decoder = new TextDecoder()

type Parser<T> = {
  parse(data: unknown): T
}

/**
 * superjson keeps `Date` values intact. Decoded values go through `schema`.
 */
export function createJsonCodec<T>(schema: Parser<T>): Codec<T> {
  return {
    encode: (value: T) => Buffer.from(superjson.stringify(value), "utf8"),
    decode: (data: Uint8Array) => schema.parse(superjson.parse<unknown>(decoder.decode(data))),
  }
}
