import type { Context, RequestHandler } from "@catalog/server"
import type { AppConfig } from "../../../app/config"
import type { ProductServices } from "../composition"
import { type ProductResponse, toProductResponseList } from "./product.presenter"
import { readPage } from "./request"

export function listProductsHandler(
  { catalog }: ProductServices,
  config: AppConfig,
): RequestHandler {
  return async (c: Context) => {
    const products = await catalog.list(readPage(c, config.pagination), {
      signal: c.req.raw.signal,
    })

    return c.json<ProductResponse[]>(toProductResponseList(products))
  }
}
