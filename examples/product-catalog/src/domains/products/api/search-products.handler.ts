import type { Context, RequestHandler } from "@catalog/server"
import type { AppConfig } from "../../../app/config"
import type { ProductServices } from "../composition"
import { type ProductResponse, toProductResponseList } from "./product.presenter"
import { readPage, readSearchQuery } from "./request"

export function searchByNameHandler(
  { catalog }: ProductServices,
  config: AppConfig,
): RequestHandler {
  return async (c: Context) => {
    const products = await catalog.searchByName(
      readSearchQuery(c),
      readPage(c, config.pagination),
      { signal: c.req.raw.signal },
    )

    return c.json<ProductResponse[]>(toProductResponseList(products))
  }
}

export function searchByCategoryHandler(
  { catalog }: ProductServices,
  config: AppConfig,
): RequestHandler {
  return async (c: Context) => {
    const products = await catalog.searchByCategory(
      readSearchQuery(c),
      readPage(c, config.pagination),
      { signal: c.req.raw.signal },
    )

    return c.json<ProductResponse[]>(toProductResponseList(products))
  }
}
