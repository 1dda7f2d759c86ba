import { z } from "zod/mini"
import type { Product } from "../model/product.model"
import { productIdSchema, specificationsSchema } from "../model/product.schema"

/** Column list in the order {@link toInsertValues} fills it. */
export const PRODUCT_COLUMNS =
  "id, name, reference_number, category, description, sku, brand, stock, images, specifications, version, created_at, updated_at"

// jsonb columns arrive parsed and timestamptz as Date
export const productRowSchema = z.object({
  id: productIdSchema,
  name: z.string(),
  reference_number: z.string(),
  category: z.string(),
  description: z.string(),
  sku: z.string(),
  brand: z.string(),
  stock: z.number(),
  images: z.array(z.string()),
  specifications: specificationsSchema,
  version: z.number(),
  created_at: z.date(),
  updated_at: z.date(),
})

export type ProductRow = z.infer<typeof productRowSchema>

export const existsRowSchema = z.object({ exists: z.boolean() })

export function fromRow(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    referenceNumber: row.reference_number,
    category: row.category,
    description: row.description,
    sku: row.sku,
    brand: row.brand,
    stock: row.stock,
    images: row.images,
    specifications: row.specifications,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }
}

export function toInsertValues(product: Product): unknown[] {
  return [
    product.id,
    product.name,
    product.referenceNumber,
    product.category,
    product.description,
    product.sku,
    product.brand,
    product.stock,
    JSON.stringify(product.images),
    JSON.stringify(product.specifications),
    product.version,
    product.createdAt,
    product.updatedAt,
  ]
}
