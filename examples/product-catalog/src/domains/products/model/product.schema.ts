import { z } from "zod/mini"
import { isSpecValue, type SpecValue } from "./product.model"
import { ProductId } from "./product-id"

export const productIdSchema = z.custom<ProductId>(ProductId.is, { error: "Invalid product id" })

export const specificationsSchema = z.record(
  z.string(),
  z.custom<SpecValue>(isSpecValue, { error: "Invalid specification value" }),
)

/** Shape of a product once decoded from a cache entry. */
export const productSchema = z.object({
  id: productIdSchema,
  name: z.string(),
  referenceNumber: z.string(),
  category: z.string(),
  description: z.string(),
  sku: z.string(),
  brand: z.string(),
  stock: z.number(),
  images: z.array(z.string()),
  specifications: specificationsSchema,
  version: z.number(),
  createdAt: z.date(),
  updatedAt: z.date(),
})
