import type { Clock } from "@catalog/clock"
import type { Logger } from "@catalog/logger"
import {
  applyUpdate,
  businessEquals,
  newProduct,
  type Product,
  type ProductChanges,
  type ProductInput,
} from "../model/product.model"
import { isProductError, ProductError } from "../model/product.errors"
import { normalizeKey, type ProductId, shortId } from "../model/product-id"
import type { Page, StoreCallOptions } from "../model/product-repository.model"
import type { CacheGuard } from "./cache-guard"
import type { CleanupRunner } from "./cleanup-runner"
import { byName, newestFirst, type ProductOrder, paginate } from "./pagination"
import {
  ALL_PRODUCTS,
  byCategoryIndex,
  byNameIndex,
  type ProductCache,
  type ProductIndex,
} from "./product-cache"
import type { ProductRepository } from "./product-repository"

export type ProductCatalogDeps = {
  repository: ProductRepository
  cache: ProductCache
  guard: CacheGuard
  cleanup: CleanupRunner
  clock: Clock
  logger: Logger
}

export type CatalogCallOptions = StoreCallOptions

type IndexedQuery = {
  index: ProductIndex
  order: ProductOrder
  page: Page
  fromStore: () => Promise<Product[]>
}

/**
 * Coordinates the product store with its write-through cache.
 *
 * The store is the source of truth. Cache failures are logged and bypassed,
 * and a read served from the cache is only trusted when every indexed entry
 * is present.
 */
export class ProductCatalog {
  public constructor(private readonly deps: ProductCatalogDeps) {}

  async create(input: ProductInput, opts: CatalogCallOptions = {}): Promise<Product> {
    const product = newProduct(input, this.deps.clock.now())
    const log = this.logFor(product.id, "create")
    const meta = { productId: shortId(product.id) }

    log.debug("Creating product")

    const cached = await this.deps.guard.call(
      "get",
      () => this.deps.cache.get(product.id, opts),
      meta,
    )

    if (cached.kind === "ok" && cached.value) {
      if (!businessEquals(cached.value, product)) throw ProductError.alreadyExists(product.id)

      log.info("Product already exists with identical fields")
      return cached.value
    }

    const result = await this.store(log, "create", () =>
      this.deps.repository.create(product, opts),
    )

    if (result.kind === "already_exists") throw ProductError.alreadyExists(product.id)

    await Promise.all([
      this.deps.guard.call("put", () => this.deps.cache.put(product, opts), meta),
      this.deps.guard.call(
        "index:all",
        () => this.deps.cache.addToIndex(ALL_PRODUCTS, product.id, opts),
        meta,
      ),
      this.deps.guard.call(
        "index:name",
        () => this.deps.cache.addToIndex(byNameIndex(product.name), product.id, opts),
        meta,
      ),
      this.deps.guard.call(
        "index:category",
        () => this.deps.cache.addToIndex(byCategoryIndex(product.category), product.id, opts),
        meta,
      ),
    ])

    log.info("Product created")
    return product
  }

  /**
   * Served from the cache when present. A store read does not repopulate the
   * cache.
   */
  async get(id: ProductId, opts: CatalogCallOptions = {}): Promise<Product> {
    const log = this.logFor(id, "get")

    const cached = await this.deps.guard.call("get", () => this.deps.cache.get(id, opts), {
      productId: shortId(id),
    })

    if (cached.kind === "ok" && cached.value) return cached.value

    const found = await this.store(log, "findById", () =>
      this.deps.repository.findById(id, opts),
    )

    if (found.kind === "not_found") throw ProductError.notFound(id)

    return found.product
  }

  async list(page: Page, opts: CatalogCallOptions = {}): Promise<Product[]> {
    return this.readIndexed("list", opts, {
      index: ALL_PRODUCTS,
      order: newestFirst,
      page,
      fromStore: () => this.deps.repository.findAll(page, opts),
    })
  }

  /**
   * The cache only answers exact (normalized) name matches; anything else is a
   * substring search in the store.
   */
  async searchByName(
    query: string,
    page: Page,
    opts: CatalogCallOptions = {},
  ): Promise<Product[]> {
    return this.readIndexed("searchByName", opts, {
      index: byNameIndex(query),
      order: byName,
      page,
      fromStore: () => this.deps.repository.findByName(query, page, opts),
    })
  }

  async searchByCategory(
    category: string,
    page: Page,
    opts: CatalogCallOptions = {},
  ): Promise<Product[]> {
    return this.readIndexed("searchByCategory", opts, {
      index: byCategoryIndex(category),
      order: newestFirst,
      page,
      fromStore: () => this.deps.repository.findByCategory(category, page, opts),
    })
  }

  async update(
    id: ProductId,
    changes: ProductChanges,
    opts: CatalogCallOptions = {},
  ): Promise<Product> {
    const log = this.logFor(id, "update")
    const meta = { productId: shortId(id) }

    log.debug("Updating product")

    const current = await this.get(id, opts)
    const next = applyUpdate(current, changes, this.deps.clock.now())

    if (businessEquals(current, next)) {
      log.debug("Update has no effect, keeping current version", { version: current.version })
      return current
    }

    const result = await this.store(log, "update", () =>
      this.deps.repository.update(next, current.version, opts),
    )

    if (result.kind === "not_found") throw ProductError.notFound(id)
    if (result.kind === "version_conflict") {
      throw ProductError.versionConflict(id, current.version)
    }

    await this.deps.guard.call("put", () => this.deps.cache.put(next, opts), meta)
    await this.moveIndex(byNameIndex(current.name), byNameIndex(next.name), id, opts)
    await this.moveIndex(
      byCategoryIndex(current.category),
      byCategoryIndex(next.category),
      id,
      opts,
    )

    log.info("Product updated", { version: next.version })
    return next
  }

  /**
   * Removes the product from the store, then cleans the cache in a detached
   * task. Cleanup failures never reach the caller.
   */
  async delete(id: ProductId, opts: CatalogCallOptions = {}): Promise<void> {
    const log = this.logFor(id, "delete")

    const snapshot = await this.deps.guard.call("get", () => this.deps.cache.get(id, opts), {
      productId: shortId(id),
    })

    const result = await this.store(log, "delete", () => this.deps.repository.delete(id, opts))

    if (result.kind === "not_found") throw ProductError.notFound(id)

    const known = snapshot.kind === "ok" ? snapshot.value : null

    this.deps.cleanup.submit(`delete:${shortId(id)}`, (signal) =>
      this.purgeFromCache(id, known, signal),
    )

    log.info("Product deleted")
  }

  private async readIndexed(
    operation: string,
    opts: CatalogCallOptions,
    query: IndexedQuery,
  ): Promise<Product[]> {
    const log = this.deps.logger.child({ operation })
    const meta = { index: query.index.kind }

    const members = await this.deps.guard.call(
      "members",
      () => this.deps.cache.members(query.index, opts),
      meta,
    )

    if (members.kind === "degraded" || members.value.length === 0) {
      return this.store(log, operation, query.fromStore)
    }

    const ids = members.value
    const hits = await this.deps.guard.call(
      "getMany",
      () => this.deps.cache.getMany(ids, opts),
      meta,
    )

    if (hits.kind === "degraded" || hits.value.length < ids.length) {
      log.debug("Incomplete cache read, using store", {
        requested: ids.length,
        found: hits.kind === "ok" ? hits.value.length : 0,
      })

      return this.store(log, operation, query.fromStore)
    }

    return paginate([...hits.value].sort(query.order), query.page)
  }

  private async moveIndex(
    from: ProductIndex,
    to: ProductIndex,
    id: ProductId,
    opts: CatalogCallOptions,
  ): Promise<void> {
    if (sameIndex(from, to)) return

    const meta = { productId: shortId(id), index: to.kind }

    await this.deps.guard.call(
      "index:remove",
      () => this.deps.cache.removeFromIndex(from, id, opts),
      meta,
    )
    await this.deps.guard.call("index:add", () => this.deps.cache.addToIndex(to, id, opts), meta)
  }

  private async purgeFromCache(
    id: ProductId,
    known: Product | null,
    signal: AbortSignal,
  ): Promise<void> {
    const opts = { signal }
    const steps = [
      this.deps.cache.evict(id, opts),
      this.deps.cache.removeFromIndex(ALL_PRODUCTS, id, opts),
    ]

    if (known) {
      steps.push(
        this.deps.cache.removeFromIndex(byNameIndex(known.name), id, opts),
        this.deps.cache.removeFromIndex(byCategoryIndex(known.category), id, opts),
      )
    }

    const failures = (await Promise.allSettled(steps)).flatMap((r): unknown[] =>
      r.status === "rejected" ? [r.reason] : [],
    )

    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} cache cleanup steps failed`)
    }
  }

  private async store<T>(log: Logger, operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn()
    } catch (err) {
      if (isProductError(err)) log.error("Product store call failed", { op: operation, err })
      throw err
    }
  }

  private logFor(id: ProductId, operation: string): Logger {
    return this.deps.logger.child({ productId: shortId(id), operation })
  }
}

function sameIndex(a: ProductIndex, b: ProductIndex): boolean {
  if (a.kind === "all" || b.kind === "all") return a.kind === b.kind

  return a.kind === b.kind && normalizeKey(a.value) === normalizeKey(b.value)
}
