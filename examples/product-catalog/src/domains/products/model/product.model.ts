import { ProductError } from "./product.errors"
import { generateProductId, type ProductId } from "./product-id"

/** A JSON value kept as-is in a product's specifications. */
export type SpecValue =
  | string
  | number
  | boolean
  | null
  | SpecValue[]
  | { [key: string]: SpecValue }

export type Specifications = { [key: string]: SpecValue }

export type Product = {
  id: ProductId
  name: string
  referenceNumber: string
  category: string
  description: string
  sku: string
  brand: string
  stock: number
  images: string[]
  specifications: Specifications
  version: number
  createdAt: Date
  updatedAt: Date
}

export type ProductInput = {
  name: string
  referenceNumber: string
  category: string
  description: string
  sku: string
  brand: string
  stock: number
  images: string[]
  specifications: Specifications
}

/** Full replacement of the mutable fields. The reference number never changes. */
export type ProductChanges = Omit<ProductInput, "referenceNumber">

export type ProductField = keyof ProductInput

type BusinessFields = Omit<Product, "id" | "version" | "createdAt" | "updatedAt">

export function newProduct(input: ProductInput, now: Date): Product {
  const fields = trimFields(input)
  validateProduct(fields)

  return {
    id: generateProductId(fields.name, fields.referenceNumber),
    ...fields,
    version: 1,
    createdAt: now,
    updatedAt: now,
  }
}

/**
 * Returns a copy of `current` with `changes` applied and the version bumped.
 *
 * @throws ProductError `invalid_product` when the result is invalid
 */
export function applyUpdate(current: Product, changes: ProductChanges, now: Date): Product {
  const fields = trimFields({ ...changes, referenceNumber: current.referenceNumber })
  validateProduct(fields)

  return {
    ...current,
    ...fields,
    version: current.version + 1,
    updatedAt: now,
  }
}

/** Upper bound of the `stock` column (Postgres `INTEGER`). */
export const MAX_STOCK = 2_147_483_647

export function validateProduct(fields: BusinessFields): void {
  if (fields.name === "") throw ProductError.invalid("name", "product name is required")
  if (fields.referenceNumber === "") {
    throw ProductError.invalid("referenceNumber", "product reference is required")
  }
  if (fields.category === "") {
    throw ProductError.invalid("category", "product category is required")
  }
  if (fields.stock < 0) throw ProductError.invalid("stock", "product stock cannot be negative")
  if (fields.stock > MAX_STOCK) {
    throw ProductError.invalid("stock", `product stock cannot exceed ${MAX_STOCK}`)
  }
}

/**
 * Compares the fields a client controls. Id, version and timestamps are ignored,
 * images compare in order and specifications regardless of key order.
 */
export function businessEquals(a: BusinessFields, b: BusinessFields): boolean {
  return (
    a.name === b.name &&
    a.referenceNumber === b.referenceNumber &&
    a.category === b.category &&
    a.description === b.description &&
    a.sku === b.sku &&
    a.brand === b.brand &&
    a.stock === b.stock &&
    a.images.length === b.images.length &&
    a.images.every((image, i) => image === b.images[i]) &&
    specValueEquals(a.specifications, b.specifications)
  )
}

export function isSpecValue(value: unknown): value is SpecValue {
  if (value === null) return true

  switch (typeof value) {
    case "string":
    case "boolean":
      return true
    case "number":
      return Number.isFinite(value)
    case "object":
      return Array.isArray(value)
        ? value.every(isSpecValue)
        : Object.values(value).every(isSpecValue)
    default:
      return false
  }
}

function specValueEquals(a: SpecValue, b: SpecValue): boolean {
  if (a === b) return true
  if (a === null || b === null || typeof a !== "object" || typeof b !== "object") return false

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false
    return a.every((item, i) => {
      const other = b[i]
      return other !== undefined && specValueEquals(item, other)
    })
  }

  const keys = Object.keys(a)
  if (keys.length !== Object.keys(b).length) return false

  return keys.every((key) => {
    const left = a[key]
    const right = b[key]
    return left !== undefined && right !== undefined && specValueEquals(left, right)
  })
}

function trimFields(input: ProductInput): ProductInput {
  return {
    name: input.name.trim(),
    referenceNumber: input.referenceNumber.trim(),
    category: input.category.trim(),
    description: input.description.trim(),
    sku: input.sku.trim(),
    brand: input.brand.trim(),
    stock: input.stock,
    images: [...input.images],
    specifications: input.specifications,
  }
}
