import { z } from "zod/mini"
import { specificationsSchema } from "../model/product.schema"

const text = () => z._default(z.string(), "")

const mutableFields = {
  name: text(),
  category: text(),
  description: text(),
  sku: text(),
  brand: text(),
  stock: z._default(z.int(), 0),
  images: z._default(z.array(z.string()), []),
  specifications: z._default(specificationsSchema, {}),
}

/** Absent fields take their zero value; the domain decides what is required. */
export const createProductRequestSchema = z.object({
  ...mutableFields,
  reference_number: text(),
})

/** A full replacement of the mutable fields. */
export const updateProductRequestSchema = z.object(mutableFields)

export type CreateProductRequest = z.infer<typeof createProductRequestSchema>
export type UpdateProductRequest = z.infer<typeof updateProductRequestSchema>
