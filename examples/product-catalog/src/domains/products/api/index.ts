import { type Application, createRouter } from "@catalog/server"
import type { AppConfig } from "../../../app/config"
import type { ProductServices } from "../composition"
import { createProductHandler } from "./create-product.handler"
import { deleteProductHandler } from "./delete-product.handler"
import { getProductHandler } from "./get-product.handler"
import { listProductsHandler } from "./list-products.handler"
import { searchByCategoryHandler, searchByNameHandler } from "./search-products.handler"
import { updateProductHandler } from "./update-product.handler"

type ProductsModuleDeps = {
  config: AppConfig
  products: ProductServices
}

export function createProductsModule(deps: ProductsModuleDeps) {
  return {
    name: "products",
    register: (api: Application) => {
      const products = createRouter()

      products.post("/", createProductHandler(deps.products))
      products.get("/", listProductsHandler(deps.products, deps.config))
      products.get("/search/name", searchByNameHandler(deps.products, deps.config))
      products.get("/search/category", searchByCategoryHandler(deps.products, deps.config))
      products.get("/:id", getProductHandler(deps.products))
      products.put("/:id", updateProductHandler(deps.products))
      products.delete("/:id", deleteProductHandler(deps.products))

      api.route("/products", products)
    },
  }
}
