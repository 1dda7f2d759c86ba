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
import { byName, newestFirst, type ProductOrder, paginate } from "../services/pagination"
import type { ProductRepository } from "../services/product-repository"

/**
 * In-process repository with the same semantics as the Postgres adapter.
 * Stored products are copied in and out.
 */
export class MemoryProductRepository implements ProductRepository {
  private readonly rows = new Map<ProductId, Product>()

  async create(product: Product, opts: StoreCallOptions = {}): Promise<CreateProductResult> {
    opts.signal?.throwIfAborted()
    if (this.rows.has(product.id)) return { kind: "already_exists" }

    this.rows.set(product.id, structuredClone(product))
    return { kind: "created" }
  }

  async update(
    product: Product,
    expectedVersion: number,
    opts: StoreCallOptions = {},
  ): Promise<UpdateProductResult> {
    opts.signal?.throwIfAborted()

    const current = this.rows.get(product.id)
    if (!current) return { kind: "not_found" }
    if (current.version !== expectedVersion) return { kind: "version_conflict" }

    this.rows.set(product.id, {
      ...structuredClone(product),
      referenceNumber: current.referenceNumber,
      createdAt: current.createdAt,
    })
    return { kind: "updated" }
  }

  async delete(id: ProductId, opts: StoreCallOptions = {}): Promise<DeleteProductResult> {
    opts.signal?.throwIfAborted()

    return this.rows.delete(id) ? { kind: "deleted" } : { kind: "not_found" }
  }

  async findById(id: ProductId, opts: StoreCallOptions = {}): Promise<FindProductResult> {
    opts.signal?.throwIfAborted()

    const product = this.rows.get(id)
    return product ? { kind: "found", product: structuredClone(product) } : { kind: "not_found" }
  }

  async findAll(page: Page, opts: StoreCallOptions = {}): Promise<Product[]> {
    return this.select(() => true, newestFirst, page, opts)
  }

  async findByCategory(
    category: string,
    page: Page,
    opts: StoreCallOptions = {},
  ): Promise<Product[]> {
    const wanted = category.toLowerCase()

    return this.select((p) => p.category.toLowerCase() === wanted, newestFirst, page, opts)
  }

  async findByName(query: string, page: Page, opts: StoreCallOptions = {}): Promise<Product[]> {
    const needle = query.toLowerCase()

    return this.select((p) => p.name.toLowerCase().includes(needle), byName, page, opts)
  }

  async exists(id: ProductId, opts: StoreCallOptions = {}): Promise<boolean> {
    opts.signal?.throwIfAborted()

    return this.rows.has(id)
  }

  async healthCheck(opts: StoreCallOptions = {}): Promise<void> {
    opts.signal?.throwIfAborted()
  }

  /** Number of stored products. */
  size(): number {
    return this.rows.size
  }

  private async select(
    match: (product: Product) => boolean,
    order: ProductOrder,
    page: Page,
    opts: StoreCallOptions,
  ): Promise<Product[]> {
    opts.signal?.throwIfAborted()

    const matches = [...this.rows.values()].filter(match).sort(order)
    return paginate(matches, page).map((p) => structuredClone(p))
  }
}
