import { type Context, parseOrThrow, type RequestHandler } from "@catalog/server"
import type { ProductServices } from "../composition"
import { createProductRequestSchema } from "./product.api.schema"
import { type ProductResponse, toProductResponse } from "./product.presenter"
import { readJsonBody } from "./request"

export function createProductHandler({ catalog }: ProductServices): RequestHandler {
  return async (c: Context) => {
    const body = parseOrThrow(createProductRequestSchema, await readJsonBody(c))

    const product = await catalog.create(
      {
        name: body.name,
        referenceNumber: body.reference_number,
        category: body.category,
        description: body.description,
        sku: body.sku,
        brand: body.brand,
        stock: body.stock,
        images: body.images,
        specifications: body.specifications,
      },
      { signal: c.req.raw.signal },
    )

    return c.json<ProductResponse>(toProductResponse(product), 201)
  }
}
