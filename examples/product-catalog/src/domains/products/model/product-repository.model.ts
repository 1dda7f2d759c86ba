import type { Product } from "./product.model"

export type Page = {
  limit: number
  offset: number
}

export type StoreCallOptions = {
  signal?: AbortSignal | undefined
}

export type ProductCreated = { kind: "created" }
export type ProductUpdated = { kind: "updated" }
export type ProductDeleted = { kind: "deleted" }
export type ProductFound = { kind: "found"; product: Product }
export type ProductAlreadyExists = { kind: "already_exists" }
export type ProductNotFound = { kind: "not_found" }
export type ProductVersionConflict = { kind: "version_conflict" }

export type CreateProductResult = ProductCreated | ProductAlreadyExists
export type UpdateProductResult = ProductUpdated | ProductNotFound | ProductVersionConflict
export type DeleteProductResult = ProductDeleted | ProductNotFound
export type FindProductResult = ProductFound | ProductNotFound
