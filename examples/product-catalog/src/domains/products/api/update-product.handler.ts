import { type Context, parseOrThrow, type RequestHandler } from "@catalog/server"
import type { ProductServices } from "../composition"
import { updateProductRequestSchema } from "./product.api.schema"
import { type ProductResponse, toProductResponse } from "./product.presenter"
import { readJsonBody, readProductId } from "./request"

export function updateProductHandler({ catalog }: ProductServices): RequestHandler {
  return async (c: Context) => {
    const id = readProductId(c)
    const changes = parseOrThrow(updateProductRequestSchema, await readJsonBody(c))

    const product = await catalog.update(id, changes, { signal: c.req.raw.signal })

    return c.json<ProductResponse>(toProductResponse(product))
  }
}
