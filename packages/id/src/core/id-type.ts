/**
 * Recognizes and parses a branded id where data crosses a boundary
 * (DB rows, JSON payloads, path parameters).
 *
 * @example
 * ```typescript
 * type SkuId = Brand<string, "SkuId">
 *
 * const isSkuId = (v: unknown): v is SkuId =>
 *   typeof v === "string" && /^sku_[a-z0-9]+$/.test(v)
 *
 * const SkuId: IdType<SkuId> = {
 *   kind: "SkuId",
 *   is: isSkuId,
 *   parse: (v) => {
 *     if (!isSkuId(v)) throw new Error("Invalid SkuId")
 *     return v
 *   },
 * }
 * ```
 */
export interface IdType<T> {
  /** Used in error messages. */
  readonly kind: string

  /** @throws when the value is not a valid id */
  parse(value: unknown): T

  is(value: unknown): value is T
}
