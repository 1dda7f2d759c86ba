import { normalizeKey } from "./model/product-id"

const PRODUCT_NS = "product_"
const PRODUCT_BY_NAME_NS = "product_by_name_"
const PRODUCT_BY_CATEGORY_NS = "product_by_category_"
const ALL_PRODUCTS_KEY = "all_products"

export function productKey(id: string): string {
  return `${PRODUCT_NS}${id}`
}

export function productsByNameKey(name: string): string {
  return `${PRODUCT_BY_NAME_NS}${normalizeKey(name)}`
}

export function productsByCategoryKey(category: string): string {
  return `${PRODUCT_BY_CATEGORY_NS}${normalizeKey(category)}`
}

export function allProductsKey(): string {
  return ALL_PRODUCTS_KEY
}
