import type { CacheCallOptions, CacheHealth, CacheKey, DataCache, SetStore } from "@catalog/cache"
import { allProductsKey, productKey, productsByCategoryKey, productsByNameKey } from "../keyspace"
import type { Product } from "../model/product.model"
import { ProductId } from "../model/product-id"

export type ProductIndex =
  | { kind: "all" }
  | { kind: "name"; value: string }
  | { kind: "category"; value: string }

export const ALL_PRODUCTS: ProductIndex = { kind: "all" }

export const byNameIndex = (name: string): ProductIndex => ({ kind: "name", value: name })

export const byCategoryIndex = (category: string): ProductIndex => ({
  kind: "category",
  value: category,
})

export type ProductCacheDeps = {
  entries: DataCache<Product>
  sets: SetStore & CacheHealth
}

/**
 * Product entries and their secondary indexes. Calls reject on any cache
 * failure; callers decide how to degrade.
 */
export class ProductCache {
  public constructor(private readonly deps: ProductCacheDeps) {}

  async get(id: ProductId, opts?: CacheCallOptions): Promise<Product | null> {
    const res = await this.deps.entries.get(productKey(id), opts)

    return res.kind === "hit" ? res.value : null
  }

  /** Hits only, in the order of `ids`. */
  async getMany(ids: readonly ProductId[], opts?: CacheCallOptions): Promise<Product[]> {
    const hits = await this.deps.entries.getMany(ids.map(productKey), opts)

    return [...hits.values()]
  }

  async put(product: Product, opts?: CacheCallOptions): Promise<void> {
    await this.deps.entries.set(productKey(product.id), product, opts)
  }

  async evict(id: ProductId, opts?: CacheCallOptions): Promise<void> {
    await this.deps.entries.invalidate(productKey(id), opts)
  }

  async addToIndex(index: ProductIndex, id: ProductId, opts?: CacheCallOptions): Promise<void> {
    await this.deps.sets.addToSet(indexKey(index), [id], opts)
  }

  async removeFromIndex(
    index: ProductIndex,
    id: ProductId,
    opts?: CacheCallOptions,
  ): Promise<void> {
    await this.deps.sets.removeFromSet(indexKey(index), [id], opts)
  }

  /** Index members that parse as product ids. */
  async members(index: ProductIndex, opts?: CacheCallOptions): Promise<ProductId[]> {
    const members = await this.deps.sets.getSet(indexKey(index), opts)

    return members.filter(ProductId.is)
  }

  async ping(opts?: CacheCallOptions): Promise<void> {
    await this.deps.sets.ping(opts)
  }
}

export function indexKey(index: ProductIndex): CacheKey {
  switch (index.kind) {
    case "all":
      return allProductsKey()
    case "name":
      return productsByNameKey(index.value)
    case "category":
      return productsByCategoryKey(index.value)
  }
}
