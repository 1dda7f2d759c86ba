import type { Context, RequestHandler } from "@catalog/server"
import type { ProductServices } from "../composition"
import type { MessageResponse } from "./product.presenter"
import { readProductId } from "./request"

export function deleteProductHandler({ catalog }: ProductServices): RequestHandler {
  return async (c: Context) => {
    await catalog.delete(readProductId(c), { signal: c.req.raw.signal })

    return c.json<MessageResponse>({ message: "Product deleted successfully" })
  }
}
