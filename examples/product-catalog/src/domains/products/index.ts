export { createProductsModule } from "./api"
export { createProductServices, type ProductServices, type ProductStores } from "./composition"
