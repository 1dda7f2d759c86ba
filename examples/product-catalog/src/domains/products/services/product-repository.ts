import type { Product } from "../model/product.model"
import type { ProductId } from "../model/product-id"
import type {
  CreateProductResult,
  DeleteProductResult,
  FindProductResult,
  Page,
  StoreCallOptions,
  UpdateProductResult,
} from "../model/product-repository.model"

/**
 * Authoritative product storage. Outcomes a caller must branch on come back as
 * results; connectivity and driver failures reject with a `ProductError`
 * (`store_unavailable` or `store_failure`).
 */
export interface ProductRepository {
  create(product: Product, opts?: StoreCallOptions): Promise<CreateProductResult>

  /**
   * Compare-and-swap on `version`: writes only when the stored version equals
   * `expectedVersion`. A miss is reported as `not_found` when the row is gone and
   * as `version_conflict` otherwise.
   */
  update(
    product: Product,
    expectedVersion: number,
    opts?: StoreCallOptions,
  ): Promise<UpdateProductResult>

  delete(id: ProductId, opts?: StoreCallOptions): Promise<DeleteProductResult>

  findById(id: ProductId, opts?: StoreCallOptions): Promise<FindProductResult>

  /** Newest first. */
  findAll(page: Page, opts?: StoreCallOptions): Promise<Product[]>

  /** Case-insensitive exact match, newest first. */
  findByCategory(category: string, page: Page, opts?: StoreCallOptions): Promise<Product[]>

  /** Case-insensitive substring match, ordered by name. */
  findByName(query: string, page: Page, opts?: StoreCallOptions): Promise<Product[]>

  exists(id: ProductId, opts?: StoreCallOptions): Promise<boolean>

  healthCheck(opts?: StoreCallOptions): Promise<void>
}
