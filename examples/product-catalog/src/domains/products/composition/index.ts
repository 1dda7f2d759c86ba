import { type CacheBackend, CodecDataCache, RedisBytesCache } from "@catalog/cache"
import type { AppConfig } from "../../../app/config"
import type { CoreServices } from "../../../app/services/core"
import type { InfraClients } from "../../../app/services/infra"
import { createJsonCodec } from "../../../lib/codec"
import { PostgresProductRepository } from "../infra/product-repository.postgres"
import type { Product } from "../model/product.model"
import { productSchema } from "../model/product.schema"
import { CacheGuard } from "../services/cache-guard"
import { CleanupRunner } from "../services/cleanup-runner"
import { ProductCache } from "../services/product-cache"
import { ProductCatalog } from "../services/product-catalog"
import type { ProductRepository } from "../services/product-repository"

export type ProductServices = {
  catalog: ProductCatalog
  repository: ProductRepository
  cache: ProductCache
  cleanup: CleanupRunner
}

/** Backends the product services sit on. Defaults come from the infra clients. */
export type ProductStores = {
  repository: ProductRepository
  cacheBackend: CacheBackend
}

export function createProductServices(
  config: AppConfig,
  core: CoreServices,
  infra: InfraClients,
  stores: Partial<ProductStores> = {},
): ProductServices {
  const logger = core.logger.child({ module: "products" })

  const repository = stores.repository ?? new PostgresProductRepository({ db: infra.pgPool })

  const cacheBackend =
    stores.cacheBackend ??
    new RedisBytesCache(infra.redisClient, {
      batchSize: config.cache.batchSize,
      keyspacePrefix: config.redis.keyPrefix,
    })

  const cache = new ProductCache({
    entries: new CodecDataCache<Product>(cacheBackend, createJsonCodec<Product>(productSchema)),
    sets: cacheBackend,
  })

  const cleanup = new CleanupRunner({ logger }, { timeoutMs: config.cache.cleanupTimeoutMs })

  const catalog = new ProductCatalog({
    repository,
    cache,
    guard: new CacheGuard({ logger }),
    cleanup,
    clock: core.clock,
    logger,
  })

  return { catalog, repository, cache, cleanup }
}
