import { type Brand, hashedUlid, isUlid, withDeriver } from "@catalog/id"

export type ProductId = Brand<string, "ProductId">

const isProductId = (value: unknown): value is ProductId => isUlid(value)

function parseProductId(value: unknown): ProductId {
  if (!isProductId(value)) throw new TypeError(`Invalid ProductId: ${String(value)}`)
  return value
}

/**
 * Product ids are ULIDs derived from the normalized business key, so the same
 * name and reference number always map to the same id.
 */
export const ProductId = withDeriver(
  {
    kind: "ProductId",
    is: isProductId,
    parse: parseProductId,
  },
  {
    derive: (seed: string) => parseProductId(hashedUlid.derive(seed)),
  },
)

export function normalizeKey(value: string): string {
  return value.trim().toLowerCase()
}

export function generateProductId(name: string, referenceNumber: string): ProductId {
  return ProductId.derive(`${normalizeKey(name)}|${normalizeKey(referenceNumber)}`)
}

/** First 8 characters, as the id appears in logs. */
export function shortId(id: string): string {
  return id.slice(0, 8)
}
