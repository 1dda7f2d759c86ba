import type { Context, RequestHandler } from "@catalog/server"
import type { ProductServices } from "../composition"
import { type ProductResponse, toProductResponse } from "./product.presenter"
import { readProductId } from "./request"

export function getProductHandler({ catalog }: ProductServices): RequestHandler {
  return async (c: Context) => {
    const product = await catalog.get(readProductId(c), { signal: c.req.raw.signal })

    return c.json<ProductResponse>(toProductResponse(product))
  }
}
